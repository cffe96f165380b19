import type {
  ControlElement,
  DataRecord,
  Screen,
  TableColumns,
  TableFillReport,
} from '../types/index.js';
import { elementKind, ownEntry } from '../types/index.js';
import type { Session } from '../driver/index.js';
import { MAIN_WINDOW, writeFieldValue } from '../driver/index.js';
import { ElementConfigurationError, StatusBarError, errorMessage } from '../exception/index.js';
import type { EventLogger } from '../logging/run-logger.js';
import { TableFiller } from '../table/index.js';
import type { RetryPolicy, Sleep } from './retry.js';
import { retryWithRecovery } from './retry.js';

/** Data bound to one screen: a record for fields and the rows for tables. */
export interface ScreenBinding {
  data: DataRecord;
  rows: DataRecord[];
}

export interface TableColumnSelection {
  tableColumns?: TableColumns;
  excludeColumns?: TableColumns;
}

export interface ScreenFillerOptions {
  logger: EventLogger;
  writeRetry: RetryPolicy;
  sleep?: Sleep;
}

/**
 * Fills the elements of one screen and commits it. Run-scoped state (the set
 * of element names already filled) is passed in by the caller.
 */
export class ScreenFiller {
  constructor(
    private session: Session,
    private options: ScreenFillerOptions,
  ) {}

  async fill(
    screen: Screen,
    binding: ScreenBinding,
    processed: Set<string>,
    columns: TableColumnSelection = {},
  ): Promise<TableFillReport[]> {
    const { logger } = this.options;
    const tables: TableFillReport[] = [];

    for (const element of screen.elements) {
      if (processed.has(element.name)) {
        await logger.log({
          level: 'info',
          event: 'element_skipped_duplicate',
          message: `Skipping duplicate element name: ${element.name} in screen: ${screen.name} as it was already processed in another screen`,
          screen: screen.name,
          element: element.name,
        });
        continue;
      }

      const kind = elementKind(element.type);

      if (element.type === 'callable') {
        if (!element.func) {
          throw new ElementConfigurationError(`Function is required for callable element: ${element.name}`);
        }
        await logger.log({
          level: 'info',
          event: 'callable_invoked',
          message: `Invoking custom fill for element: ${element.name}`,
          screen: screen.name,
          element: element.name,
        });
        await element.func(this.session.driver, binding.data, binding.rows);
        processed.add(element.name);
      } else if (kind === 'field') {
        if (await this.fillField(element, binding.data, screen.name)) {
          processed.add(element.name);
        }
      } else if (kind === 'table') {
        tables.push(await this.fillTable(element, binding.rows, columns, screen.name));
        processed.add(element.name);
      } else {
        throw new ElementConfigurationError(
          `Unsupported element type '${element.type}' for element: ${element.name}`,
        );
      }
    }

    if (screen.pressEnter ?? true) {
      await logger.log({
        level: 'info',
        event: 'screen_committed',
        message: `Pressing enter for screen: ${screen.name}`,
        screen: screen.name,
      });
      await this.session.commit((message) => new StatusBarError(message));
    }

    return tables;
  }

  /**
   * Returns true when a value was written. Locate and write failures are
   * retried with a forced confirm key in between.
   */
  private async fillField(element: ControlElement, data: DataRecord, screen: string): Promise<boolean> {
    const { logger, writeRetry, sleep } = this.options;
    const value = ownEntry(data, element.name);
    if (value === undefined || value === null) return false;

    return retryWithRecovery(
      async (attempt) => {
        const handle = await this.session.findOptional(element.id);
        if (!handle) {
          await logger.log({
            level: 'warn',
            event: 'element_missing',
            message: `Element ${element.name} not found in current screen: ${screen}, skipping data entry for this element`,
            screen,
            element: element.name,
          });
          return false;
        }

        await writeFieldValue(this.session.driver, handle, value, { raiseIfReadOnly: true });
        await logger.log({
          level: 'info',
          event: 'field_written',
          message: `Set element: '${element.name}' in screen: '${screen}'`,
          screen,
          element: element.name,
          attempt,
        });
        return true;
      },
      {
        policy: writeRetry,
        sleep,
        recover: async (error, attempt) => {
          await logger.log({
            level: 'warn',
            event: 'write_retry',
            message: `Write to ${element.name} failed on attempt ${attempt}: ${errorMessage(error)}`,
            screen,
            element: element.name,
            attempt,
          });
          await this.session.pressEnter(MAIN_WINDOW);
        },
      },
    );
  }

  private async fillTable(
    element: ControlElement,
    rows: DataRecord[],
    selection: TableColumnSelection,
    screen: string,
  ): Promise<TableFillReport> {
    const filler = new TableFiller(this.session.driver, element.id, {
      logger: this.options.logger,
      screen,
    });

    const { tableColumns, excludeColumns } = selection;
    return filler.fill(rows, {
      columns: tableColumns ? ownEntry(tableColumns, element.name) : undefined,
      excludeColumns: excludeColumns ? ownEntry(excludeColumns, element.name) : undefined,
    });
  }
}
