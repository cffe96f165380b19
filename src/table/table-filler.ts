import type { DataRecord, FieldValue, TableFillMode, TableFillReport } from '../types/index.js';
import type { ElementHandle, UiDriver } from '../driver/index.js';
import { Session, VKey, writeFieldValue } from '../driver/index.js';
import { TableConfigurationError, TableFillError } from '../exception/index.js';
import type { ErrorFactory } from '../exception/index.js';
import type { EventLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';

export interface TableFillOptions {
  /** Allow-list of column titles. */
  columns?: string[];
  /** Block-list of column titles. */
  excludeColumns?: string[];
  /** Focus each cell before writing it. */
  setFocus?: boolean;
}

export interface TableFillerOptions {
  logger?: EventLogger;
  /** Screen name, carried on log events. */
  screen?: string;
}

export interface FillStrategy {
  mode: TableFillMode;
  paginationKey: number;
  /** Row the cursor returns to after a page turn. */
  resumeRow: number;
}

/** Normalised column title -> column index. */
export type ColumnMap = Map<string, number>;

const TABLE_ERROR_PREFIX = 'Error while filling table';

const tableError: ErrorFactory = (message) => new TableFillError(message);

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

/**
 * Build the column map from the grid's headers. Titles are compared trimmed
 * and lower-cased; empty titles are dropped and a duplicated title keeps the
 * index of its last occurrence.
 */
export function resolveColumnMap(
  titles: string[],
  filter: Pick<TableFillOptions, 'columns' | 'excludeColumns'> = {},
): ColumnMap {
  const { columns, excludeColumns } = filter;
  if (hasItems(columns) && hasItems(excludeColumns)) {
    throw new TableConfigurationError("Cannot specify both 'columns' and 'excludeColumns'");
  }

  const full: ColumnMap = new Map();
  titles.forEach((title, index) => {
    const key = normalizeTitle(title);
    if (key) full.set(key, index);
  });

  if (hasItems(columns)) {
    const allowed = new Set(columns.map(normalizeTitle));
    return new Map([...full].filter(([title]) => allowed.has(title)));
  }

  if (hasItems(excludeColumns)) {
    const blocked = new Set(excludeColumns.map(normalizeTitle));
    return new Map([...full].filter(([title]) => !blocked.has(title)));
  }

  return full;
}

/**
 * A grid whose scrollbar maximum is zero has no rows yet: new rows appear by
 * confirming the page, and the last row of the old page comes back as the
 * first row of the new one. A populated grid pages cleanly with page-down.
 */
export function fillStrategy(scrollMaximum: number): FillStrategy {
  if (scrollMaximum === 0) {
    return { mode: 'growth', paginationKey: VKey.ENTER, resumeRow: 1 };
  }
  return { mode: 'overwrite', paginationKey: VKey.PAGE_DOWN, resumeRow: 0 };
}

/**
 * Fills a grid control row by row, turning pages whenever the cursor reaches
 * the last visible row.
 */
export class TableFiller {
  private session: Session;
  private logger: EventLogger;
  private screen?: string;

  constructor(
    private driver: UiDriver,
    readonly tableId: string,
    options: TableFillerOptions = {},
  ) {
    this.session = new Session(driver);
    this.logger = options.logger ?? silentLogger;
    this.screen = options.screen;
  }

  async fill(rows: DataRecord[], options: TableFillOptions = {}): Promise<TableFillReport> {
    if (hasItems(options.columns) && hasItems(options.excludeColumns)) {
      throw new TableConfigurationError("Cannot specify both 'columns' and 'excludeColumns'");
    }
    if (rows.length === 0) {
      throw new TableConfigurationError(`No rows provided for table ${this.tableId}`);
    }

    let grid = await this.session.locate(this.tableId);
    const columnMap = resolveColumnMap(await this.driver.columnTitles(grid), options);
    const visibleRows = await this.driver.visibleRowCount(grid);
    const range = await this.driver.scrollRange(grid);
    const strategy = fillStrategy(range.maximum);

    if (visibleRows <= strategy.resumeRow) {
      throw new TableConfigurationError(
        `Table ${this.tableId} shows ${visibleRows} row(s); ${strategy.mode} mode needs more than ${strategy.resumeRow}`,
      );
    }

    await this.logger.log({
      level: 'info',
      event: 'table_started',
      message: `Filling table ${this.tableId} (${rows.length} rows). Mode: ${strategy.mode}`,
      screen: this.screen,
      table: this.tableId,
      mode: strategy.mode,
      columns: [...columnMap.keys()],
    });

    if (strategy.mode === 'overwrite') {
      await this.driver.scrollTo(grid, 0);
      grid = await this.session.locate(this.tableId);
    }

    const report: TableFillReport = {
      table: this.tableId,
      mode: strategy.mode,
      rowsWritten: 0,
      pageTurns: 0,
      cellsSkipped: 0,
    };

    let page = 1;
    let rowIndex = 0;

    for (const row of rows) {
      report.cellsSkipped += await this.writeRow(grid, rowIndex, row, columnMap, options.setFocus ?? false);
      report.rowsWritten++;

      if (rowIndex === visibleRows - 1) {
        await this.turnPage(strategy.paginationKey);
        grid = await this.session.locate(this.tableId);
        page++;
        report.pageTurns++;
        rowIndex = strategy.resumeRow;
        await this.logger.log({
          level: 'debug',
          event: 'table_page_turn',
          message: `Moved to page ${page} of table ${this.tableId}`,
          screen: this.screen,
          table: this.tableId,
          page,
        });
      } else {
        rowIndex++;
      }
    }

    await this.session.pressEnter();
    await this.checkPage();
    await this.logger.log({
      level: 'info',
      event: 'table_committed',
      message: `Table ${this.tableId} committed`,
      screen: this.screen,
      ...report,
    });

    return report;
  }

  /** Returns the number of read-only cells skipped. */
  private async writeRow(
    grid: ElementHandle,
    rowIndex: number,
    row: DataRecord,
    columnMap: ColumnMap,
    setFocus: boolean,
  ): Promise<number> {
    const values = normalizeRecord(row);
    let skipped = 0;

    // Iterate the column map, not the record: records may carry extra keys.
    for (const [column, columnIndex] of columnMap) {
      const value = values.get(column);
      if (value === undefined || value === null) continue;

      const cell = await this.driver.cell(grid, rowIndex, columnIndex);
      if (setFocus) {
        await this.driver.setFocus(cell);
      }

      const written = await writeFieldValue(this.driver, cell, value);
      if (!written) {
        skipped++;
        await this.logger.log({
          level: 'warn',
          event: 'cell_read_only',
          message: `Cell of column '${column}' at ${rowIndex}, ${columnIndex} is not changeable`,
          screen: this.screen,
          table: this.tableId,
        });
      }
    }

    return skipped;
  }

  private async turnPage(key: number): Promise<void> {
    await this.session.sendKey(key);
    await this.checkPage();
  }

  /** Clear transient popups, then fail on a blocking dialog or an error status. */
  private async checkPage(): Promise<void> {
    await this.session.dismissPopups();
    await this.session.raiseIfErrorDialog(tableError, TABLE_ERROR_PREFIX);
    await this.session.raiseForStatus(tableError, TABLE_ERROR_PREFIX);
  }
}

function normalizeRecord(row: DataRecord): Map<string, FieldValue | undefined> {
  const values = new Map<string, FieldValue | undefined>();
  for (const [key, value] of Object.entries(row)) {
    values.set(normalizeTitle(key), value);
  }
  return values;
}

function hasItems(list: string[] | undefined): list is string[] {
  return list !== undefined && list.length > 0;
}
