/**
 * Operation Smell Types
 *
 * @module types/smells
 */

import type { OperationKind } from './store.js';

export type OperationSmellType = 'excessive_results' | 'large_batch' | 'complex_filter';

export type SmellSeverity = 'info' | 'warning';

export interface OperationSmell {
  smellType: OperationSmellType;
  scope: string;
  operation: OperationKind;
  target: string;
  description: string;
  severity: SmellSeverity;
  suggestion: string;
  timestamp: number;
}

export interface OperationSmellReport {
  totalSmells: number;
  byType: Partial<Record<OperationSmellType, number>>;
  bySeverity: Partial<Record<SmellSeverity, number>>;
  recent: OperationSmell[];
}
