/**
 * Comparison report renderers
 *
 * Markdown for terminals and files, JSON for tooling, and a standalone
 * HTML page.
 */

import type { BenchmarkResult } from '../types/benchmark.js';
import { ReportError } from '../utils/errors.js';
import type { AverageMetrics, ComparisonReport, SystemResults, Verdict } from './comparison.js';

export const REPORT_FORMATS = ['markdown', 'md', 'json', 'html'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * `2024-05-01T12:30:45.123Z` → `2024-05-01 12:30:45 UTC`
 */
export function formatUtc(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function verdictSentence(verdict: Verdict): string {
  if (verdict.metric === 'throughput') {
    return (
      `🏆 **${verdict.winner} wins in throughput** by ${verdict.differencePercent.toFixed(1)}% ` +
      `(${verdict.winnerValue.toFixed(2)} vs ${verdict.loserValue.toFixed(2)} req/s)`
    );
  }
  return (
    `⚡ **${verdict.winner} wins in response time** by ${verdict.differencePercent.toFixed(1)}% ` +
    `(${verdict.winnerValue.toFixed(2)}ms vs ${verdict.loserValue.toFixed(2)}ms)`
  );
}

function summaryRow(averages: AverageMetrics): string {
  return (
    `| ${averages.system} | ${averages.requestsPerSecond.toFixed(2)} | ` +
    `${averages.averageResponseTimeMs.toFixed(2)} | ${averages.p95ResponseTimeMs.toFixed(2)} | ` +
    `${averages.p99ResponseTimeMs.toFixed(2)} |\n`
  );
}

function resultBlock(result: BenchmarkResult): string {
  let block = `**${result.testName}**\n`;
  block += `- Requests/sec: ${result.requestsPerSecond.toFixed(2)}\n`;
  block += `- Avg response time: ${result.averageResponseTimeMs.toFixed(2)}ms\n`;
  block += `- P95 response time: ${result.p95ResponseTimeMs.toFixed(2)}ms\n`;
  block += `- P99 response time: ${result.p99ResponseTimeMs.toFixed(2)}ms\n`;
  block += `\n`;
  return block;
}

export function renderMarkdown(report: ComparisonReport): string {
  const { systemA, systemB } = report;

  let markdown = `# ${systemA.name} vs ${systemB.name} Performance Comparison Report\n\n`;
  markdown += `Generated at: ${formatUtc(report.generatedAt)}\n\n`;

  markdown += `## Summary\n\n`;
  markdown += `| System | Avg RPS | Avg Response Time (ms) | P95 (ms) | P99 (ms) |\n`;
  markdown += `|--------|---------|------------------------|----------|----------|\n`;
  if (report.averages.a) {
    markdown += summaryRow(report.averages.a);
  }
  if (report.averages.b) {
    markdown += summaryRow(report.averages.b);
  }

  markdown += `\n## Detailed Results\n\n`;
  for (const system of [systemA, systemB]) {
    if (system.results.length === 0) {
      continue;
    }
    markdown += `### ${system.name} Results\n\n`;
    system.results.forEach((result) => {
      markdown += resultBlock(result);
    });
  }

  markdown += `## Analysis\n\n`;
  if (report.verdicts.length === 0) {
    markdown += `Not enough results to compare ${systemA.name} and ${systemB.name}.\n\n`;
  }
  report.verdicts.forEach((verdict) => {
    markdown += `${verdictSentence(verdict)}\n\n`;
  });

  return markdown;
}

export function renderJson(report: ComparisonReport): string {
  return JSON.stringify(
    {
      generatedAt: report.generatedAt,
      systemA: { name: report.systemA.name, results: report.systemA.results },
      systemB: { name: report.systemB.name, results: report.systemB.results },
      averages: report.averages,
      verdicts: report.verdicts,
    },
    null,
    2
  );
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function htmlSummaryRow(averages: AverageMetrics, winners: Set<string>): string {
  const cls = winners.has(averages.system) ? ' class="winner"' : '';
  return `        <tr${cls}>
            <td>${escapeHtml(averages.system)}</td>
            <td>${averages.requestsPerSecond.toFixed(2)}</td>
            <td>${averages.averageResponseTimeMs.toFixed(2)}</td>
            <td>${averages.p95ResponseTimeMs.toFixed(2)}</td>
            <td>${averages.p99ResponseTimeMs.toFixed(2)}</td>
        </tr>
`;
}

function htmlVerdict(verdict: Verdict): string {
  const winner = escapeHtml(verdict.winner);
  const diff = verdict.differencePercent.toFixed(1);
  if (verdict.metric === 'throughput') {
    return `    <p>🏆 <strong>${winner} wins in throughput</strong> by ${diff}% (${verdict.winnerValue.toFixed(2)} vs ${verdict.loserValue.toFixed(2)} req/s)</p>\n`;
  }
  return `    <p>⚡ <strong>${winner} wins in response time</strong> by ${diff}% (${verdict.winnerValue.toFixed(2)}ms vs ${verdict.loserValue.toFixed(2)}ms)</p>\n`;
}

function htmlResultsTable(system: SystemResults): string {
  let html = `    <h3>${escapeHtml(system.name)}</h3>\n    <table>\n`;
  html += `        <tr><th>Test</th><th>RPS</th><th>Avg (ms)</th><th>P95 (ms)</th><th>P99 (ms)</th></tr>\n`;
  system.results.forEach((result) => {
    html +=
      `        <tr><td>${escapeHtml(result.testName)}</td>` +
      `<td>${result.requestsPerSecond.toFixed(2)}</td>` +
      `<td>${result.averageResponseTimeMs.toFixed(2)}</td>` +
      `<td>${result.p95ResponseTimeMs.toFixed(2)}</td>` +
      `<td>${result.p99ResponseTimeMs.toFixed(2)}</td></tr>\n`;
  });
  html += `    </table>\n`;
  return html;
}

export function renderHtml(report: ComparisonReport): string {
  const title = `${escapeHtml(report.systemA.name)} vs ${escapeHtml(report.systemB.name)} Performance Comparison`;
  const winners = new Set(report.verdicts.map((verdict) => verdict.winner));

  let rows = '';
  if (report.averages.a) {
    rows += htmlSummaryRow(report.averages.a, winners);
  }
  if (report.averages.b) {
    rows += htmlSummaryRow(report.averages.b, winners);
  }

  const analysis = report.verdicts.map(htmlVerdict).join('');
  const details = [report.systemA, report.systemB]
    .filter((system) => system.results.length > 0)
    .map(htmlResultsTable)
    .join('');

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>${title}</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 40px; }
        table { border-collapse: collapse; width: 100%; margin-bottom: 24px; }
        th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
        th { background-color: #f2f2f2; }
        .winner { background-color: #d4edda; }
    </style>
</head>
<body>
    <h1>${title}</h1>
    <p>Generated at: ${formatUtc(report.generatedAt)}</p>

    <h2>Summary</h2>
    <table>
        <tr>
            <th>System</th>
            <th>Avg RPS</th>
            <th>Avg Response Time (ms)</th>
            <th>P95 (ms)</th>
            <th>P99 (ms)</th>
        </tr>
${rows}    </table>

    <h2>Analysis</h2>
${analysis}
    <h2>Detailed Results</h2>
${details}</body>
</html>
`;
}

/**
 * Render a comparison in the requested format
 *
 * @throws {ReportError} for an unsupported format
 */
export function renderReport(report: ComparisonReport, format: string): string {
  switch (format) {
    case 'markdown':
    case 'md':
      return renderMarkdown(report);
    case 'json':
      return renderJson(report);
    case 'html':
      return renderHtml(report);
    default:
      throw new ReportError(`Unsupported report format: ${format} (expected one of ${REPORT_FORMATS.join(', ')})`);
  }
}
