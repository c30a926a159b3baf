import { isBackendName, type StorageConfig } from '../types/index.js';
import type { Clock } from './clock.js';
import type { Logger } from '../utils/logger.js';
import { ValidationError } from './errors.js';
import { createRepository, type NoteStore, type RepositoryFactory } from './repository-factory.js';

export interface BackendSelectorOptions {
  logger: Logger;
  clock?: Clock;
  factory?: RepositoryFactory;
}

/**
 * Resolves the configured backend to one shared, initialized repository.
 *
 * The backend name is read once at construction. The first `select()` builds
 * and initializes the adapter; concurrent first callers await the same
 * initialization and every caller receives the same instance.
 */
export class BackendSelector {
  private readonly logger: Logger;
  private pending: Promise<NoteStore> | null = null;

  constructor(
    private readonly config: StorageConfig,
    private readonly options: BackendSelectorOptions
  ) {
    if (!isBackendName(config.backend)) {
      throw new ValidationError(`Unknown storage backend: ${String(config.backend)}`);
    }
    this.logger = options.logger.child({ component: 'backend-selector' });
  }

  get backend(): StorageConfig['backend'] {
    return this.config.backend;
  }

  select(): Promise<NoteStore> {
    if (!this.pending) {
      this.pending = this.build().catch((error: unknown) => {
        // Let a later call retry after a failed start.
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }

  async close(): Promise<void> {
    const pending = this.pending;
    this.pending = null;
    if (!pending) {
      return;
    }
    let store: NoteStore;
    try {
      store = await pending;
    } catch (error) {
      this.logger.debug({ err: error }, 'Backend never started; nothing to close');
      return;
    }
    await store.repository.close();
    this.logger.info({ backend: store.backend }, 'Storage backend closed');
  }

  private async build(): Promise<NoteStore> {
    const factory = this.options.factory ?? createRepository;
    const store = factory(this.config.backend, this.config, {
      logger: this.options.logger,
      clock: this.options.clock,
    });
    await store.repository.initialize();
    this.logger.info({ backend: store.backend }, 'Storage backend selected');
    return store;
  }
}
