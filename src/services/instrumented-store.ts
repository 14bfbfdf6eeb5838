/**
 * Instrumented Store
 *
 * Request path in front of a store collaborator:
 * - query: answered from the result cache, the store fills a miss
 * - insert/update/delete: forwarded to the store, then the scope's cached
 *   results are invalidated (also when the write fails, since it may have
 *   been partially applied)
 *
 * Every operation, successful or not, is timed and reported to the runtime.
 * Store errors are rethrown unchanged after being recorded.
 */

import type { Logger } from 'pino';
import type {
  OperationKind,
  OperationShape,
  StoreCollaborator,
  StoreOperationArgs,
} from '../types/store.js';
import type { AdaptiveRuntime } from './adaptive-runtime.js';
import { deriveCacheKey } from '../core/fingerprint.js';
import { assertScope, assertStoreOperationArgs } from '../api/validators.js';

export interface InstrumentedStoreOptions {
  /** TTL of cached query results; defaults to the cache's TTL */
  ttlSeconds?: number;

  now?: () => number;
  logger?: Logger;
}

/**
 * Shape of a store operation, as seen by trails and smell checks
 */
export function operationShape(kind: OperationKind, args: StoreOperationArgs): OperationShape {
  let batchSize: number | undefined;
  if (kind === 'insert' || kind === 'update') {
    batchSize = args.documents?.length ?? args.ids?.length;
  } else if (kind === 'delete') {
    batchSize = args.ids?.length;
  }

  return {
    target: args.collection,
    filter: args.where,
    resultLimit: kind === 'query' ? args.nResults : undefined,
    batchSize,
  };
}

export class InstrumentedStore<R> {
  private readonly runtime: AdaptiveRuntime<R>;
  private readonly store: StoreCollaborator<R>;
  private readonly ttlSeconds?: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(runtime: AdaptiveRuntime<R>, store: StoreCollaborator<R>, options: InstrumentedStoreOptions = {}) {
    this.runtime = runtime;
    this.store = store;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  public query(scope: string, args: StoreOperationArgs): Promise<R> {
    return this.run(scope, 'query', args);
  }

  public insert(scope: string, args: StoreOperationArgs): Promise<R> {
    return this.run(scope, 'insert', args);
  }

  public update(scope: string, args: StoreOperationArgs): Promise<R> {
    return this.run(scope, 'update', args);
  }

  public delete(scope: string, args: StoreOperationArgs): Promise<R> {
    return this.run(scope, 'delete', args);
  }

  private async run(scope: string, kind: OperationKind, args: StoreOperationArgs): Promise<R> {
    assertScope(scope);
    assertStoreOperationArgs(args);

    const shape = operationShape(kind, args);
    const startedAt = this.now();

    try {
      const result = kind === 'query' ? await this.read(scope, args) : await this.write(scope, kind, args);
      this.runtime.recordOperation(scope, kind, Math.max(0, this.now() - startedAt), true, shape);
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.runtime.recordOperation(scope, kind, Math.max(0, this.now() - startedAt), false, shape, message);
      this.logger?.warn({ scope, operation: kind, collection: args.collection, err }, 'Store operation failed');
      throw err;
    }
  }

  private read(scope: string, args: StoreOperationArgs): Promise<R> {
    const key = deriveCacheKey('query', args);
    return this.runtime.cacheLookupOrCompute(scope, key, this.ttlSeconds, () => this.store.execute('query', args));
  }

  private async write(scope: string, kind: OperationKind, args: StoreOperationArgs): Promise<R> {
    try {
      return await this.store.execute(kind, args);
    } finally {
      const removed = this.runtime.invalidate(scope);
      this.logger?.debug({ scope, operation: kind, removed }, 'Cached results invalidated after write');
    }
  }
}
