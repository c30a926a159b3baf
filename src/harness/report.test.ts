import { describe, expect, it } from 'vitest';

import type { HarnessReport } from './conformance.js';
import { formatReport } from './report.js';

const report: HarnessReport = {
  startedAt: new Date('2024-05-01T12:00:00.000Z'),
  benchmarkSize: 10,
  backends: [
    {
      backend: 'in-memory',
      status: 'passed',
      scenarios: [
        { name: 'crud', assertions: [], outcome: {}, matchesReference: true, passed: true },
      ],
      benchmark: [
        { phase: 'insert', operations: 10, elapsedMs: 4, opsPerSec: 2500 },
        { phase: 'lookup', operations: 10, elapsedMs: 2, opsPerSec: 5000 },
        { phase: 'search', operations: 1, elapsedMs: 4, opsPerSec: 250 },
      ],
    },
    {
      backend: 'document',
      status: 'failed',
      error: 'scenarios failed: crud',
      scenarios: [
        {
          name: 'crud',
          assertions: [
            { description: 'get returns the added note', passed: false },
            { description: 'deleted note is gone', passed: true },
          ],
          outcome: {},
          matchesReference: false,
          passed: false,
        },
      ],
      benchmark: [],
    },
    {
      backend: 'graph',
      status: 'failed',
      error: 'connection refused',
      scenarios: [],
      benchmark: [],
    },
  ],
};

describe('formatReport', () => {
  it('renders a padded table followed by failure details', () => {
    expect(formatReport(report).split('\n')).toEqual([
      'backend    status  scenarios  matches  insert ops/s  lookup ops/s  search ops/s',
      'in-memory  passed  1/1        1/1      2500.0        5000.0        250.0',
      'document   failed  0/1        0/1      -             -             -',
      'graph      failed  0/0        0/0      -             -             -',
      'document: scenarios failed: crud',
      '  crud: outcome differs from reference',
      '  crud: get returns the added note',
      'graph: connection refused',
    ]);
  });

  it('prints scenario errors in place of the reference note', () => {
    const failed: HarnessReport = {
      ...report,
      backends: [
        {
          backend: 'relational',
          status: 'failed',
          error: 'scenarios failed: stats',
          scenarios: [
            {
              name: 'stats',
              assertions: [],
              outcome: null,
              error: 'database is locked',
              matchesReference: false,
              passed: false,
            },
          ],
          benchmark: [],
        },
      ],
    };

    expect(formatReport(failed).split('\n').slice(2)).toEqual([
      'relational: scenarios failed: stats',
      '  stats: database is locked',
    ]);
  });
});
