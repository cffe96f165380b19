import type { UiDriver } from '../driver/ui-driver.js';

export type FieldValue = string | number | boolean | Date | null;

export type DataRecord = Record<string, FieldValue | undefined>;

export type RunData = DataRecord | DataRecord[];

export type ControlElementType =
  | 'text'
  | 'combobox'
  | 'button'
  | 'checkbox'
  | 'radio'
  | 'tab'
  | 'table';

export type ElementType = ControlElementType | 'callable';

/** How the screen filler treats an element type. */
export type ElementKind = 'field' | 'click' | 'table' | 'callable';

/**
 * Custom fill step for controls the generic field writer cannot handle.
 * Receives the scalar record bound to the screen and the full row list.
 */
export type CallableFill = (
  driver: UiDriver,
  data: DataRecord,
  rows: DataRecord[],
) => void | Promise<void>;

interface BaseElement {
  /** Join key into the data records; also the run-scoped dedup key. */
  name: string;
  description?: string;
}

export interface ControlElement extends BaseElement {
  type: ControlElementType;
  /** Window-scoped control id, e.g. `wnd[0]/usr/txtFIELD`. */
  id: string;
}

export interface CallableElement extends BaseElement {
  type: 'callable';
  id?: string;
  func?: CallableFill;
}

export type Element = ControlElement | CallableElement;

export function elementKind(type: ElementType): ElementKind {
  switch (type) {
    case 'text':
    case 'combobox':
      return 'field';
    case 'button':
    case 'checkbox':
    case 'radio':
    case 'tab':
      return 'click';
    case 'table':
      return 'table';
    case 'callable':
      return 'callable';
  }
}

export function isPresent(value: FieldValue | undefined): boolean {
  return value !== undefined && value !== null && value !== '';
}

/** Own-property lookup; names such as `constructor` never reach `Object.prototype`. */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
