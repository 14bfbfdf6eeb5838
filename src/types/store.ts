/**
 * Store Collaborator Types
 *
 * Narrow contract through which the runtime consumes the underlying
 * document/vector store. The runtime never initiates a store call on its
 * own: reads reach the store only to fill a cache miss.
 *
 * @module types/store
 */

/**
 * Operation kinds reported to the health and trail layers
 */
export type OperationKind = 'query' | 'insert' | 'update' | 'delete';

export const OPERATION_KINDS: readonly OperationKind[] = ['query', 'insert', 'update', 'delete'];

/**
 * Metadata filter as accepted by the store (`where` clause)
 */
export type FilterValue =
  | string
  | number
  | boolean
  | null
  | FilterValue[]
  | { [key: string]: FilterValue };

export type MetadataFilter = { [key: string]: FilterValue };

/**
 * Arguments of a single store operation
 */
export interface StoreOperationArgs {
  /** Target collection */
  collection: string;

  /** Metadata filter */
  where?: MetadataFilter;

  /** Query texts (query operations) */
  queryTexts?: string[];

  /** Maximum number of results (query operations) */
  nResults?: number;

  /** Document ids (get/update/delete) */
  ids?: string[];

  /** Documents to write (insert/update) */
  documents?: string[];

  /** Per-document metadata (insert/update) */
  metadatas?: Record<string, FilterValue>[];
}

/**
 * Store collaborator
 *
 * `execute` may be synchronous or return a promise; the instrumented path
 * awaits either.
 */
export interface StoreCollaborator<R = unknown> {
  execute(kind: OperationKind, args: StoreOperationArgs): R | Promise<R>;
}

/**
 * Normalized operation shape used to derive trail signatures and to run
 * operation smell checks
 */
export interface OperationShape {
  /** Target collection (or other addressed resource) */
  target: string;

  /** Filter whose shape (not values) becomes part of the signature */
  filter?: MetadataFilter;

  /** Requested result limit */
  resultLimit?: number;

  /** Number of documents written in one call */
  batchSize?: number;
}
