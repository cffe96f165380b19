export type {
  FieldValue,
  DataRecord,
  RunData,
  ControlElementType,
  ElementType,
  ElementKind,
  CallableFill,
  ControlElement,
  CallableElement,
  Element,
} from './element.js';
export { elementKind, isPresent, ownEntry } from './element.js';
export type {
  Action,
  ActionType,
  ClickAction,
  PressEnterAction,
  DismissPopupsAction,
  BackAction,
  SendVKeyAction,
} from './action.js';
export type {
  Screen,
  ScreenMap,
  TableColumns,
  ScreenReference,
  RawScreenOrderEntry,
  ScreenOrderEntry,
} from './screen.js';
export type { StatusSeverity, StatusInfo } from './status.js';
export type { TableFillMode, TableFillReport, ScreenOutcome, RunResult } from './run-result.js';
