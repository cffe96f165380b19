import type { ScreenOrderEntry } from './screen.js';

export type TableFillMode = 'growth' | 'overwrite';

export interface TableFillReport {
  table: string;
  mode: TableFillMode;
  rowsWritten: number;
  pageTurns: number;
  cellsSkipped: number;
}

export interface ScreenOutcome {
  entry: ScreenOrderEntry;
  status: 'action' | 'filled' | 'skipped';
  tables: TableFillReport[];
}

export interface RunResult {
  transactionCode: string;
  outcomes: ScreenOutcome[];
  processedElements: string[];
  durationMs: number;
}
