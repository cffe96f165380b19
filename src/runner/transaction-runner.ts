import type {
  DataRecord,
  RunData,
  RunResult,
  Screen,
  ScreenMap,
  ScreenOrderEntry,
  ScreenOutcome,
} from '../types/index.js';
import { isPresent, ownEntry } from '../types/index.js';
import type { UiDriver } from '../driver/index.js';
import { Session } from '../driver/index.js';
import { ScreenMappingError, classifyError, errorMessage } from '../exception/index.js';
import type { EventLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';
import { executeActions } from './action-executor.js';
import type { RetryPolicy, Sleep } from './retry.js';
import { DEFAULT_WRITE_RETRY } from './retry.js';
import type { ScreenOrderInput } from './screen-order.js';
import { buildScreenOrder } from './screen-order.js';
import type { ScreenBinding } from './screen-filler.js';
import { ScreenFiller } from './screen-filler.js';

export interface TransactionRunnerConfig {
  transactionCode: string;
  screenMap: ScreenMap;
  /** Defaults to the screen map's insertion order. */
  screenOrder?: ScreenOrderInput[];
  data: RunData;
  /** Per-screen data; takes precedence over `data` for the screens it names. */
  screenData?: Record<string, RunData>;
}

export interface TransactionRunnerOptions {
  logger?: EventLogger;
  writeRetry?: RetryPolicy;
  sleep?: Sleep;
}

/**
 * Runs one transaction: starts it, then walks the screen order filling each
 * screen from the bound data. Any failure aborts the run; screens committed
 * before the failure stay committed.
 */
export class TransactionRunner {
  readonly screenOrder: ScreenOrderEntry[];
  private session: Session;
  private logger: EventLogger;
  private filler: ScreenFiller;
  private processedElements = new Set<string>();

  constructor(
    driver: UiDriver,
    private config: TransactionRunnerConfig,
    options: TransactionRunnerOptions = {},
  ) {
    this.session = new Session(driver);
    this.logger = options.logger ?? silentLogger;
    this.screenOrder = buildScreenOrder(config.screenOrder, config.screenMap);
    this.filler = new ScreenFiller(this.session, {
      logger: this.logger,
      writeRetry: options.writeRetry ?? DEFAULT_WRITE_RETRY,
      sleep: options.sleep,
    });
  }

  async run(): Promise<RunResult> {
    const start = Date.now();
    const { transactionCode } = this.config;
    const outcomes: ScreenOutcome[] = [];
    this.processedElements = new Set<string>();

    try {
      await this.logger.log({
        level: 'info',
        event: 'transaction_started',
        message: `Starting transaction: ${transactionCode}`,
        transaction: transactionCode,
      });
      await this.session.startTransaction(transactionCode);

      for (const entry of this.screenOrder) {
        outcomes.push(await this.processEntry(entry));
      }
    } catch (error) {
      await this.logger.log({
        level: 'error',
        event: 'run_failed',
        message: errorMessage(error),
        transaction: transactionCode,
        category: classifyError(error),
        completedEntries: outcomes.length,
      });
      throw error;
    }

    const result: RunResult = {
      transactionCode,
      outcomes,
      processedElements: [...this.processedElements],
      durationMs: Date.now() - start,
    };

    await this.logger.log({
      level: 'info',
      event: 'run_completed',
      message: `Transaction ${transactionCode} completed`,
      transaction: transactionCode,
      durationMs: result.durationMs,
    });

    return result;
  }

  private async processEntry(entry: ScreenOrderEntry): Promise<ScreenOutcome> {
    if (entry.kind === 'action') {
      await executeActions(this.session, entry.action, this.logger);
      return { entry, status: 'action', tables: [] };
    }

    const screen = ownEntry(this.config.screenMap, entry.name);
    if (!screen) {
      throw new ScreenMappingError(`Screen mapping not defined for screen: ${entry.name}`);
    }

    await this.logger.log({
      level: 'info',
      event: 'screen_started',
      message: `Processing screen: ${screen.name}`,
      screen: screen.name,
    });

    const binding = this.bindData(screen);
    if (!hasDataForScreen(screen, binding.data)) {
      await this.logger.log({
        level: 'info',
        event: 'screen_skipped',
        message: `Skipping screen: ${screen.name} - no data to fill for this screen`,
        screen: screen.name,
      });
      return { entry, status: 'skipped', tables: [] };
    }

    if (screen.onEntry) {
      await executeActions(this.session, screen.onEntry, this.logger, screen.name);
    }

    const tables = await this.filler.fill(screen, binding, this.processedElements, {
      tableColumns: entry.tableColumns,
      excludeColumns: entry.excludeColumns,
    });

    if (screen.onExit) {
      await executeActions(this.session, screen.onExit, this.logger, screen.name);
    }

    return { entry, status: 'filled', tables };
  }

  private bindData(screen: Screen): ScreenBinding {
    const { screenData } = this.config;
    const override = screenData ? ownEntry(screenData, screen.name) : undefined;
    const selected = override !== undefined && !isEmptyData(override) ? override : this.config.data;
    return bindRunData(selected);
  }
}

/**
 * A list of records gives its first record to the fields and the whole list
 * to tables; a single record serves both.
 */
export function bindRunData(data: RunData): ScreenBinding {
  if (Array.isArray(data)) {
    return { data: data[0] ?? {}, rows: data };
  }
  return { data, rows: [data] };
}

/**
 * Tables always count as data: whether rows match any column is only known
 * once the grid's columns are read.
 */
export function hasDataForScreen(screen: Screen, data: DataRecord): boolean {
  return screen.elements.some(
    (element) => element.type === 'table' || isPresent(ownEntry(data, element.name)),
  );
}

function isEmptyData(data: RunData): boolean {
  return Array.isArray(data) ? data.length === 0 : Object.keys(data).length === 0;
}
