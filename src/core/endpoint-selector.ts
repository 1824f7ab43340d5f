/**
 * Weighted endpoint selection
 *
 * Each call is independent: an endpoint is picked with probability
 * `weight / totalWeight`, regardless of earlier picks.
 */

import type { EndpointDefinition } from '../types/benchmark.js';
import { ConfigurationError } from '../utils/errors.js';
import { mathRandomSource, type RandomSource } from '../utils/random.js';

export class EndpointSelector {
  constructor(private readonly random: RandomSource = mathRandomSource) {}

  /**
   * Pick one endpoint from a non-empty list.
   *
   * Draws `r` in `[0, total)` and walks the list subtracting weights; the
   * first endpoint that brings the remainder to <= 0 wins. Floating-point
   * drift past the end falls back to the last weighted endpoint.
   *
   * @throws {ConfigurationError} for an empty list, or several endpoints
   * whose weights sum to zero
   */
  select(endpoints: readonly EndpointDefinition[]): EndpointDefinition {
    const last = endpoints[endpoints.length - 1];
    if (!last) {
      throw new ConfigurationError('Cannot select from an empty endpoint list');
    }
    if (endpoints.length === 1) {
      return last;
    }

    const total = endpoints.reduce((sum, endpoint) => sum + endpoint.weight, 0);
    if (!(total > 0)) {
      throw new ConfigurationError('Total endpoint weight must be greater than zero');
    }

    let remainder = this.random.next() * total;
    let lastWeighted = last;
    for (const endpoint of endpoints) {
      // zero-weight entries are never picked, even on a draw of exactly 0
      if (endpoint.weight <= 0) {
        continue;
      }
      lastWeighted = endpoint;
      remainder -= endpoint.weight;
      if (remainder <= 0) {
        return endpoint;
      }
    }

    return lastWeighted;
  }
}
