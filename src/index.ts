export { EndpointSelector } from './core/endpoint-selector.js';
export {
  NodeHttpTransport,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from './core/http-transport.js';
export { RequestExecutor, isSuccessStatus, monotonicNow, type MonotonicClock } from './core/request-executor.js';
export { VirtualUser, rampUpDelayMs, DEFAULT_THINK_TIME_MS } from './core/virtual-user.js';
export { LoadTester, runBenchmark, type LoadTesterOptions, type LoadTesterEvents } from './core/load-tester.js';
export { MetricsAggregate, errorKey } from './metrics/metrics-aggregate.js';

export {
  compare,
  calculateAverageMetrics,
  type ComparisonReport,
  type SystemResults,
  type AverageMetrics,
  type Verdict,
} from './reporting/comparison.js';
export { renderReport, renderMarkdown, renderJson, renderHtml, REPORT_FORMATS, type ReportFormat } from './reporting/renderers.js';
export { saveResults, loadResults, reportFileName } from './reporting/result-store.js';
export { BenchmarkSuite, buildScenarioConfig, type BenchmarkSuiteOptions, type ComparisonRun } from './runner/benchmark-suite.js';

export {
  createBenchmarkConfig,
  validateBenchmarkConfig,
  defineEndpoint,
  defaultBenchmarkConfig,
} from './config/benchmark-config.js';
export {
  loadConfig,
  validateLoadTestConfig,
  findScenario,
  type LoadTestConfig,
  type Scenario,
  type SystemTarget,
  type RunDefaults,
  type TimingConfig,
} from './config/loader.js';

export * from './utils/errors.js';
export { createLogger, setRootLogger, type Logger } from './utils/logger.js';
export { XorShift32Source, SequenceRandomSource, mathRandomSource, type RandomSource } from './utils/random.js';

export type * from './types/benchmark.js';
