import type { Action } from './action.js';
import type { Element } from './element.js';

export interface Screen {
  name: string;
  description?: string;
  elements: Element[];
  /** Navigation into the screen (tab clicks, toolbar buttons). */
  onEntry?: Action | Action[];
  onExit?: Action | Action[];
  /** Commit with the confirm key after filling. Defaults to true. */
  pressEnter?: boolean;
}

export type ScreenMap = Record<string, Screen>;

/** Per-table column lists, keyed by table element name. */
export type TableColumns = Record<string, string[]>;

export interface ScreenReference {
  name: string;
  tableColumns?: TableColumns;
  excludeColumns?: TableColumns;
}

/**
 * Screen order as written in configuration: a screen name, a legacy
 * `ACTION_*` token, a screen reference or an explicit action.
 */
export type RawScreenOrderEntry = string | ScreenReference | { action: Action };

export type ScreenOrderEntry =
  | ({ kind: 'screen' } & ScreenReference)
  | { kind: 'action'; action: Action };
