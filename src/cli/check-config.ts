#!/usr/bin/env node
/**
 * CLI: validate a transaction configuration directory → JSONL events on stdout.
 *
 * Usage: check-config <configDir> [dataFile]
 *
 * Loads transaction.json and screens.json from configDir (and the data file,
 * when given) with the same loader the runner uses, and reports the resolved
 * screen order. Callable elements are bound to placeholders, since their
 * functions only exist in the host program.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CallableRegistry, loadRunData, loadTransactionConfig } from '../config/index.js';
import { ScreensFileSchema } from '../schemas/index.js';
import { classifyError, errorMessage } from '../exception/index.js';
import { bindRunData } from '../runner/index.js';
import type { ScreenOrderEntry } from '../types/index.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

function describeEntry(entry: ScreenOrderEntry): Record<string, unknown> {
  if (entry.kind === 'screen') {
    return {
      kind: 'screen',
      name: entry.name,
      ...(entry.tableColumns ? { tableColumns: entry.tableColumns } : {}),
      ...(entry.excludeColumns ? { excludeColumns: entry.excludeColumns } : {}),
    };
  }
  return { kind: 'action', ...entry.action };
}

/**
 * Bind every callable name used in screens.json to a function that refuses
 * to run, so the rest of the configuration can still be checked.
 */
async function placeholderRegistry(configDir: string): Promise<CallableRegistry> {
  const registry = new CallableRegistry();
  const screens = ScreensFileSchema.parse(
    JSON.parse(await readFile(join(configDir, 'screens.json'), 'utf-8')),
  );

  for (const screen of screens) {
    for (const element of screen.elements) {
      if (element.type === 'callable' && !registry.get(element.fn)) {
        const fn = element.fn;
        registry.register(fn, () => {
          throw new Error(`Callable "${fn}" is a check-config placeholder`);
        });
      }
    }
  }

  return registry;
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const [configDir, dataFile] = process.argv.slice(2);
  if (!configDir) {
    emit({ type: 'config_error', error: 'Usage: check-config <configDir> [dataFile]' });
    process.exitCode = 1;
    return;
  }

  try {
    const config = await loadTransactionConfig(configDir, await placeholderRegistry(configDir));
    emit({
      type: 'config_ok',
      transactionCode: config.transactionCode,
      screens: Object.keys(config.screenMap).length,
      order: config.screenOrder.map(describeEntry),
    });

    if (dataFile) {
      const data = await loadRunData(dataFile);
      const binding = bindRunData(data.data);
      emit({
        type: 'data_ok',
        rows: binding.rows.length,
        fields: Object.keys(binding.data).length,
        screenOverrides: Object.keys(data.screenData ?? {}),
      });
    }
  } catch (err) {
    emit({
      type: 'config_error',
      error: errorMessage(err),
      category: classifyError(err),
    });
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  emit({ type: 'config_error', error: errorMessage(err) });
  process.exitCode = 1;
});
