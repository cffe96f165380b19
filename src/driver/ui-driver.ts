import type { StatusInfo } from '../types/index.js';

export type ControlKind =
  | 'text'
  | 'combobox'
  | 'button'
  | 'checkbox'
  | 'radio'
  | 'tab'
  | 'table'
  | 'window'
  | 'other';

export interface ElementHandle {
  id: string;
  kind: ControlKind;
  changeable: boolean;
  maxLength?: number;
}

export interface ComboEntry {
  key: string;
  value: string;
}

export interface ScrollRange {
  minimum: number;
  maximum: number;
}

/** A modal window that blocks input and cannot be dismissed as a popup. */
export interface ErrorDialog {
  title: string;
  text: string;
}

/**
 * Virtual keys understood by the terminal's windows.
 */
export const VKey = {
  ENTER: 0,
  BACK: 3,
  CANCEL: 12,
  PAGE_UP: 81,
  PAGE_DOWN: 82,
} as const;

export type VKeyCode = (typeof VKey)[keyof typeof VKey];

export const MAIN_WINDOW = 0;
export const POPUP_WINDOW = 1;

/**
 * Capability surface of the live terminal UI. Every call is a blocking round
 * trip to the host; callers await them strictly in sequence.
 */
export interface UiDriver {
  startTransaction(code: string): Promise<void>;
  /** Never throws for a missing element when `raiseIfMissing` is false. */
  locate(id: string, raiseIfMissing: boolean): Promise<ElementHandle | null>;
  readText(handle: ElementHandle): Promise<string>;
  writeText(handle: ElementHandle, value: string): Promise<void>;
  click(handle: ElementHandle): Promise<void>;
  setFocus(handle: ElementHandle): Promise<void>;
  comboEntries(handle: ElementHandle): Promise<ComboEntry[]>;
  selectComboKey(handle: ElementHandle, key: string): Promise<void>;
  sendKey(windowIndex: number, key: number, repeat: number): Promise<void>;
  status(): Promise<StatusInfo>;
  dismissTransientPopups(): Promise<void>;
  /** Blocking dialog open at `windowIndex`; dismissable popups report null. */
  errorDialog(windowIndex: number): Promise<ErrorDialog | null>;

  visibleRowCount(grid: ElementHandle): Promise<number>;
  scrollRange(grid: ElementHandle): Promise<ScrollRange>;
  scrollTo(grid: ElementHandle, offset: number): Promise<void>;
  columnTitles(grid: ElementHandle): Promise<string[]>;
  cell(grid: ElementHandle, row: number, column: number): Promise<ElementHandle>;
}
