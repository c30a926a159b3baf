#!/usr/bin/env tsx

/**
 * Run the conformance scenarios and benchmark against the backends listed in
 * BENCH_BACKENDS and log the comparison table.
 *
 * Usage: npm run bench
 */

import { createRepository } from './core/repository-factory.js';
import { ConformanceHarness, type BackendFactory } from './harness/conformance.js';
import { formatReport } from './harness/report.js';
import { loadConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, name: 'notes-bench' });

  const factories: BackendFactory[] = config.bench.backends.map((name) => ({
    name,
    create: () => createRepository(name, config.storage, { logger }).repository,
  }));

  logger.info({ backends: config.bench.backends, size: config.bench.size }, 'Starting benchmark');
  const harness = new ConformanceHarness({ logger, benchmarkSize: config.bench.size });
  const report = await harness.run(factories);

  logger.info(`\n${formatReport(report)}`);

  const failed = report.backends.filter((backend) => backend.status === 'failed');
  if (failed.length > 0) {
    logger.error({ failed: failed.map((backend) => backend.backend) }, 'Benchmark finished with failures');
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  createLogger().fatal({ err: error }, 'Benchmark crashed');
  process.exit(1);
});
