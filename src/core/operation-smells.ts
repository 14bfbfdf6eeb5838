/**
 * Operation Smell Monitor
 *
 * Inspects the shape of individual store operations for usage
 * anti-patterns: oversized result limits, oversized write batches and
 * overly complex metadata filters. Complements the trail tracker, which
 * only sees repetition.
 */

import type { Logger } from 'pino';
import type { OperationKind, OperationShape } from '../types/store.js';
import type {
  OperationSmell,
  OperationSmellReport,
  OperationSmellType,
  SmellSeverity,
} from '../types/smells.js';
import { canonicalJson } from './fingerprint.js';

export interface OperationSmellConfig {
  /** Result limit above which a query is flagged */
  maxResultLimit: number;

  /** Batch size above which a write is flagged */
  maxBatchSize: number;

  /** Serialized filter length above which a filter is flagged */
  maxFilterLength: number;

  /** Number of smells retained for reporting */
  maxHistory: number;

  now?: () => number;
  logger?: Logger;
}

export function createDefaultSmellConfig(): Omit<OperationSmellConfig, 'now' | 'logger'> {
  return {
    maxResultLimit: 100,
    maxBatchSize: 1000,
    maxFilterLength: 500,
    maxHistory: 1000,
  };
}

type SmellFinding = Pick<OperationSmell, 'description' | 'severity' | 'suggestion'>;

type SmellCheck = (
  kind: OperationKind,
  shape: OperationShape,
  config: OperationSmellConfig
) => SmellFinding | null;

const CHECKS: ReadonlyArray<[OperationSmellType, SmellCheck]> = [
  [
    'excessive_results',
    (kind, shape, config) =>
      kind === 'query' && shape.resultLimit !== undefined && shape.resultLimit > config.maxResultLimit
        ? {
            description: `Query requesting ${shape.resultLimit} results, which may be excessive`,
            severity: 'warning',
            suggestion: 'Consider paginating results or reducing the result limit',
          }
        : null,
  ],
  [
    'large_batch',
    (kind, shape, config) =>
      (kind === 'insert' || kind === 'update') &&
      shape.batchSize !== undefined &&
      shape.batchSize > config.maxBatchSize
        ? {
            description: `Writing ${shape.batchSize} documents in a single batch`,
            severity: 'warning',
            suggestion: `Consider batching into groups of at most ${Math.floor(config.maxBatchSize / 2)} documents`,
          }
        : null,
  ],
  [
    'complex_filter',
    (_kind, shape, config) =>
      shape.filter && canonicalJson(shape.filter).length > config.maxFilterLength
        ? {
            description: 'Complex metadata filter detected',
            severity: 'info',
            suggestion: 'Consider simplifying filters or using indexed fields',
          }
        : null,
  ],
];

export class OperationSmellMonitor {
  private readonly config: OperationSmellConfig;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private smells: OperationSmell[] = [];

  constructor(config: OperationSmellConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
  }

  /**
   * Run every shape check against one operation
   *
   * @returns Smells detected for this operation (also retained for reports)
   */
  public analyze(scope: string, kind: OperationKind, shape: OperationShape): OperationSmell[] {
    const found: OperationSmell[] = [];
    const timestamp = this.now();

    for (const [smellType, check] of CHECKS) {
      const finding = check(kind, shape, this.config);
      if (finding) {
        found.push({
          smellType,
          scope,
          operation: kind,
          target: shape.target,
          ...finding,
          timestamp,
        });
      }
    }

    if (found.length > 0) {
      this.smells.push(...found);
      if (this.smells.length > this.config.maxHistory) {
        this.smells = this.smells.slice(-this.config.maxHistory);
      }
      this.logger?.debug(
        { scope, operation: kind, target: shape.target, smells: found.map((s) => s.smellType) },
        'Operation smells detected'
      );
    }

    return found;
  }

  /**
   * Totals by type and severity plus the 10 most recent smells
   */
  public getReport(scope?: string): OperationSmellReport {
    const relevant = scope === undefined ? this.smells : this.smells.filter((s) => s.scope === scope);
    const byType: Partial<Record<OperationSmellType, number>> = {};
    const bySeverity: Partial<Record<SmellSeverity, number>> = {};

    for (const smell of relevant) {
      byType[smell.smellType] = (byType[smell.smellType] ?? 0) + 1;
      bySeverity[smell.severity] = (bySeverity[smell.severity] ?? 0) + 1;
    }

    return {
      totalSmells: relevant.length,
      byType,
      bySeverity,
      recent: relevant.slice(-10),
    };
  }

  public clear(): void {
    this.smells = [];
  }
}
