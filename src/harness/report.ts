import type { BenchmarkPhase } from './benchmark.js';
import type { BackendReport, HarnessReport } from './conformance.js';

const PHASES: readonly BenchmarkPhase[] = ['insert', 'lookup', 'search'];

const HEADERS = ['backend', 'status', 'scenarios', 'matches', ...PHASES.map((p) => `${p} ops/s`)];

function opsPerSec(backend: BackendReport, phase: BenchmarkPhase): string {
  const result = backend.benchmark.find((entry) => entry.phase === phase);
  return result ? result.opsPerSec.toFixed(1) : '-';
}

function row(backend: BackendReport): string[] {
  const total = backend.scenarios.length;
  const passed = backend.scenarios.filter((scenario) => scenario.passed).length;
  const matching = backend.scenarios.filter((scenario) => scenario.matchesReference).length;
  return [
    backend.backend,
    backend.status,
    `${passed}/${total}`,
    `${matching}/${total}`,
    ...PHASES.map((phase) => opsPerSec(backend, phase)),
  ];
}

/**
 * Render the report as a fixed-width text table, followed by one line per
 * failed backend and per failed assertion.
 */
export function formatReport(report: HarnessReport): string {
  const rows = [HEADERS, ...report.backends.map(row)];
  const widths = HEADERS.map((_, column) =>
    Math.max(...rows.map((cells) => (cells[column] ?? '').length))
  );
  const lines = rows.map((cells) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd()
  );

  for (const backend of report.backends) {
    if (backend.status === 'passed') {
      continue;
    }
    lines.push(`${backend.backend}: ${backend.error ?? 'failed'}`);
    for (const scenario of backend.scenarios) {
      if (scenario.error !== undefined) {
        lines.push(`  ${scenario.name}: ${scenario.error}`);
      } else if (!scenario.matchesReference) {
        lines.push(`  ${scenario.name}: outcome differs from reference`);
      }
      for (const assertion of scenario.assertions) {
        if (!assertion.passed) {
          lines.push(`  ${scenario.name}: ${assertion.description}`);
        }
      }
    }
  }
  return lines.join('\n');
}
