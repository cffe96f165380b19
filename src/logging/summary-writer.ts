import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunResult, ScreenOrderEntry } from '../types/index.js';

export interface SummaryOptions {
  runDir: string;
  result: RunResult;
  operatorNotes?: string[];
}

/**
 * Write a markdown summary of a completed run to `<runDir>/summary.md`.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  const { runDir, result, operatorNotes } = options;
  await mkdir(runDir, { recursive: true });
  await writeFile(join(runDir, 'summary.md'), buildSummaryMarkdown(result, operatorNotes), 'utf-8');
}

export function buildSummaryMarkdown(result: RunResult, operatorNotes?: string[]): string {
  const screens = result.outcomes.filter((o) => o.entry.kind === 'screen');
  const filled = screens.filter((o) => o.status === 'filled').length;
  const skipped = screens.filter((o) => o.status === 'skipped').length;
  const actions = result.outcomes.length - screens.length;

  const lines: string[] = [
    '# Run Summary',
    `- Transaction: ${result.transactionCode}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Screens: ${filled} filled, ${skipped} skipped`,
    `- Actions: ${actions}`,
    `- Elements filled: ${result.processedElements.length}`,
    '',
    '## Sequence',
  ];

  result.outcomes.forEach((outcome, i) => {
    lines.push(`${i + 1}. ${describeEntry(outcome.entry)}: ${outcome.status}`);
  });

  const tables = result.outcomes.flatMap((o) => o.tables);
  if (tables.length > 0) {
    lines.push('');
    lines.push('## Tables');
    for (const table of tables) {
      lines.push(
        `- ${table.table} (${table.mode}): ${table.rowsWritten} rows, ${table.pageTurns} page turns, ${table.cellsSkipped} read-only cells skipped`,
      );
    }
  }

  if (operatorNotes && operatorNotes.length > 0) {
    lines.push('');
    lines.push('## Operator Notes');
    for (const note of operatorNotes) {
      lines.push(`- ${note}`);
    }
  }

  return lines.join('\n') + '\n';
}

function describeEntry(entry: ScreenOrderEntry): string {
  if (entry.kind === 'screen') return `Screen "${entry.name}"`;
  const { action } = entry;
  if (action.type === 'click') return `Action click ${action.targetId ?? '(no target)'}`;
  if (action.type === 'send_vkey') return `Action send_vkey ${action.vkey ?? '(no key)'}`;
  return `Action ${action.type}`;
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
