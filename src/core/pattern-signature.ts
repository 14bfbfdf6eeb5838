/**
 * Pattern Signatures
 *
 * A pattern signature describes the shape of an operation rather than its
 * literal arguments: `query:articles:{author:string,year:{$gt:number}}`.
 * Two queries that differ only in filter values share a trail.
 */

import type { FilterValue, MetadataFilter, OperationKind, OperationShape } from '../types/store.js';

const LOGICAL_OPERATORS = new Set(['$and', '$or']);

/**
 * Describe a filter value by its type, recursing into operator objects
 */
function describeValue(value: FilterValue): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  if (typeof value === 'object') {
    return describeFilter(value);
  }

  return typeof value;
}

/**
 * Describe a filter's shape: sorted keys, values replaced by their types
 */
export function describeFilter(filter: MetadataFilter): string {
  const parts = Object.keys(filter)
    .sort()
    .map((key) => {
      const value = filter[key];
      if (LOGICAL_OPERATORS.has(key) && Array.isArray(value)) {
        const clauses = value.map((clause) =>
          clause !== null && typeof clause === 'object' && !Array.isArray(clause)
            ? describeFilter(clause)
            : describeValue(clause)
        );
        return `${key}:[${clauses.join(',')}]`;
      }
      return `${key}:${value === undefined ? 'undefined' : describeValue(value)}`;
    });

  return `{${parts.join(',')}}`;
}

/**
 * Build the trail key of an operation
 *
 * @example
 * ```typescript
 * patternSignature('query', { target: 'articles', filter: { year: { $gt: 2020 } } });
 * // => 'query:articles:{year:{$gt:number}}'
 * ```
 */
export function patternSignature(kind: OperationKind, shape: OperationShape): string {
  const filterShape = shape.filter && Object.keys(shape.filter).length > 0
    ? describeFilter(shape.filter)
    : '*';
  return `${kind}:${shape.target}:${filterShape}`;
}
