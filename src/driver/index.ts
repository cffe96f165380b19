export { VKey, MAIN_WINDOW, POPUP_WINDOW } from './ui-driver.js';
export type {
  UiDriver,
  ElementHandle,
  ControlKind,
  ComboEntry,
  ScrollRange,
  ErrorDialog,
  VKeyCode,
} from './ui-driver.js';
export { writeFieldValue, formatFieldValue } from './field-writer.js';
export type { WriteFieldOptions } from './field-writer.js';
export { Session } from './session.js';
