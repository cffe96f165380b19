import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  Element,
  RunData,
  Screen,
  ScreenMap,
  ScreenOrderEntry,
} from '../types/index.js';
import type { ElementConfig, ScreenConfig } from '../schemas/index.js';
import { DataFileSchema, ScreensFileSchema, TransactionFileSchema } from '../schemas/index.js';
import { ScreenMappingError } from '../exception/index.js';
import type { RetryPolicy } from '../runner/retry.js';
import { buildScreenOrder } from '../runner/screen-order.js';
import { CallableRegistry } from './callable-registry.js';

export interface TransactionConfig {
  transactionCode: string;
  screenMap: ScreenMap;
  screenOrder: ScreenOrderEntry[];
  writeRetry?: RetryPolicy;
}

export interface RunDataFile {
  data: RunData;
  screenData?: Record<string, RunData>;
}

/**
 * Load `transaction.json` and `screens.json` from a configuration directory.
 * Callable elements are bound to functions from `registry`, and the screen
 * order is resolved here so that a bad action token fails at load time.
 */
export async function loadTransactionConfig(
  configDir: string,
  registry: CallableRegistry = new CallableRegistry(),
): Promise<TransactionConfig> {
  const [transactionRaw, screensRaw] = await Promise.all([
    readFile(join(configDir, 'transaction.json'), 'utf-8'),
    readFile(join(configDir, 'screens.json'), 'utf-8'),
  ]);

  const transaction = TransactionFileSchema.parse(JSON.parse(transactionRaw));
  const screens = ScreensFileSchema.parse(JSON.parse(screensRaw));

  const screenMap = buildScreenMap(screens, registry);
  const screenOrder = buildScreenOrder(transaction.screenOrder, screenMap);

  for (const entry of screenOrder) {
    if (entry.kind === 'screen' && !Object.hasOwn(screenMap, entry.name)) {
      throw new ScreenMappingError(`Screen order references unknown screen: ${entry.name}`);
    }
  }

  return {
    transactionCode: transaction.transactionCode,
    screenMap,
    screenOrder,
    writeRetry: transaction.options?.writeRetry,
  };
}

export async function loadRunData(filePath: string): Promise<RunDataFile> {
  const raw = await readFile(filePath, 'utf-8');
  return DataFileSchema.parse(JSON.parse(raw));
}

export function buildScreenMap(screens: ScreenConfig[], registry: CallableRegistry): ScreenMap {
  const seen = new Set<string>();
  const entries: [string, Screen][] = [];

  for (const config of screens) {
    if (seen.has(config.name)) {
      throw new ScreenMappingError(`Screen "${config.name}" is defined more than once`);
    }
    seen.add(config.name);
    entries.push([
      config.name,
      { ...config, elements: config.elements.map((element) => toElement(element, registry)) },
    ]);
  }

  // Own data properties even for names such as `__proto__`.
  return Object.fromEntries(entries);
}

function toElement(config: ElementConfig, registry: CallableRegistry): Element {
  if (config.type === 'callable') {
    const { fn, ...rest } = config;
    return { ...rest, func: registry.resolve(fn, config.name) };
  }
  return config;
}
