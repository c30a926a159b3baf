import { errorMessage } from '../core/errors.js';
import { MemoryNoteRepository } from '../repositories/memory-note-repository.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import type { BackendName } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { runBenchmark, type PhaseResult } from './benchmark.js';
import { SCENARIOS, type Outcome, type Scenario } from './scenarios.js';

export interface BackendFactory {
  name: BackendName;
  create(): NoteRepository;
}

export interface AssertionResult {
  description: string;
  passed: boolean;
}

export interface ScenarioResult {
  name: string;
  assertions: AssertionResult[];
  outcome: Outcome | null;
  error?: string;
  /** Whether the normalized outcome equals the in-memory reference. */
  matchesReference: boolean;
  passed: boolean;
}

export interface BackendReport {
  backend: BackendName;
  status: 'passed' | 'failed';
  error?: string;
  scenarios: ScenarioResult[];
  benchmark: PhaseResult[];
}

export interface HarnessReport {
  startedAt: Date;
  benchmarkSize: number;
  backends: BackendReport[];
}

export interface HarnessOptions {
  logger: Logger;
  benchmarkSize: number;
  scenarios?: readonly Scenario[];
}

interface ScenarioRun {
  assertions: AssertionResult[];
  outcome: Outcome | null;
  error?: string;
}

async function runScenario(repository: NoteRepository, scenario: Scenario): Promise<ScenarioRun> {
  const assertions: AssertionResult[] = [];
  const check = (description: string, passed: boolean) => {
    assertions.push({ description, passed });
  };
  await repository.clear();
  try {
    const outcome = await scenario.run({ repository, check });
    return { assertions, outcome };
  } catch (error) {
    return { assertions, outcome: null, error: errorMessage(error) };
  }
}

/**
 * Runs the scenario sequence and benchmark against each backend in turn.
 *
 * Outcomes are compared against a private in-memory reference run. A backend
 * that fails to start or throws is reported as failed and the remaining
 * backends still run.
 */
export class ConformanceHarness {
  private readonly logger: Logger;
  private readonly scenarios: readonly Scenario[];

  constructor(private readonly options: HarnessOptions) {
    this.logger = options.logger.child({ component: 'harness' });
    this.scenarios = options.scenarios ?? SCENARIOS;
  }

  async run(factories: BackendFactory[]): Promise<HarnessReport> {
    const startedAt = new Date();
    const reference = await this.referenceOutcomes();
    const backends: BackendReport[] = [];
    for (const factory of factories) {
      backends.push(await this.runBackend(factory, reference));
    }
    return { startedAt, benchmarkSize: this.options.benchmarkSize, backends };
  }

  private async referenceOutcomes(): Promise<Map<string, string>> {
    const repository = new MemoryNoteRepository({ logger: this.options.logger });
    await repository.initialize();
    const outcomes = new Map<string, string>();
    try {
      for (const scenario of this.scenarios) {
        const result = await runScenario(repository, scenario);
        if (result.error !== undefined) {
          throw new Error(`Reference scenario ${scenario.name} failed: ${result.error}`);
        }
        outcomes.set(scenario.name, JSON.stringify(result.outcome));
      }
    } finally {
      await repository.close();
    }
    return outcomes;
  }

  private async runBackend(
    factory: BackendFactory,
    reference: Map<string, string>
  ): Promise<BackendReport> {
    const report: BackendReport = {
      backend: factory.name,
      status: 'failed',
      scenarios: [],
      benchmark: [],
    };
    let repository: NoteRepository | null = null;
    try {
      repository = factory.create();
      await repository.initialize();

      for (const scenario of this.scenarios) {
        const run = await runScenario(repository, scenario);
        const matchesReference =
          run.error === undefined && JSON.stringify(run.outcome) === reference.get(scenario.name);
        report.scenarios.push({
          name: scenario.name,
          ...run,
          matchesReference,
          passed: matchesReference && run.assertions.every((assertion) => assertion.passed),
        });
      }

      await repository.clear();
      report.benchmark = await runBenchmark(repository, this.options.benchmarkSize);

      const failed = report.scenarios.filter((scenario) => !scenario.passed);
      if (failed.length === 0) {
        report.status = 'passed';
      } else {
        report.error = `scenarios failed: ${failed.map((scenario) => scenario.name).join(', ')}`;
      }
    } catch (error) {
      report.error = errorMessage(error);
      this.logger.error({ err: error, backend: factory.name }, 'Backend run aborted');
    } finally {
      if (repository) {
        await this.cleanup(factory.name, repository);
      }
    }
    this.logger.info(
      { backend: factory.name, status: report.status, error: report.error },
      'Backend run finished'
    );
    return report;
  }

  /**
   * Best effort: errors are logged and never change the report.
   */
  private async cleanup(backend: BackendName, repository: NoteRepository): Promise<void> {
    try {
      await repository.clear();
    } catch (error) {
      this.logger.warn({ err: error, backend }, 'Cleanup: clear failed');
    }
    try {
      await repository.close();
    } catch (error) {
      this.logger.warn({ err: error, backend }, 'Cleanup: close failed');
    }
  }
}
