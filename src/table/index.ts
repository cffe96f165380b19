export { TableFiller, resolveColumnMap, fillStrategy, normalizeTitle } from './table-filler.js';
export type { TableFillOptions, TableFillerOptions, FillStrategy, ColumnMap } from './table-filler.js';
