import type { FieldValue } from '../types/index.js';
import type { ElementHandle, UiDriver } from './ui-driver.js';
import { ComboOptionNotFoundError, ElementNotChangeableError } from '../exception/index.js';

export interface WriteFieldOptions {
  /** Throw instead of returning false when the control is read-only. */
  raiseIfReadOnly?: boolean;
}

/**
 * Format a value the way the host expects it typed into a field.
 * Dates become `dd.mm.yyyy`.
 */
export function formatFieldValue(value: Exclude<FieldValue, null>): string {
  if (value instanceof Date) {
    const day = String(value.getDate()).padStart(2, '0');
    const month = String(value.getMonth() + 1).padStart(2, '0');
    return `${day}.${month}.${value.getFullYear()}`;
  }
  return String(value).trim();
}

/**
 * Write a value into a text-like control. Comboboxes are set by matching the
 * visible entry text; plain fields are truncated to their max length.
 *
 * Returns false when the control is read-only and `raiseIfReadOnly` is off.
 */
export async function writeFieldValue(
  driver: UiDriver,
  handle: ElementHandle,
  value: Exclude<FieldValue, null>,
  options: WriteFieldOptions = {},
): Promise<boolean> {
  if (!handle.changeable) {
    if (options.raiseIfReadOnly) {
      throw new ElementNotChangeableError(
        `Element ${handle.id} (${handle.kind}) is not changeable`,
        handle.id,
      );
    }
    return false;
  }

  const text = formatFieldValue(value);

  if (handle.kind === 'combobox') {
    await selectComboEntry(driver, handle, text);
    return true;
  }

  const clipped =
    handle.maxLength !== undefined && handle.maxLength > 0 && text.length > handle.maxLength
      ? text.slice(0, handle.maxLength)
      : text;
  await driver.writeText(handle, clipped);
  return true;
}

async function selectComboEntry(driver: UiDriver, handle: ElementHandle, text: string): Promise<void> {
  const target = text.trim().toLowerCase();
  const entries = await driver.comboEntries(handle);
  const match = entries.find((entry) => entry.value.trim().toLowerCase() === target);

  if (!match) {
    throw new ComboOptionNotFoundError(`Option '${text}' not found in combobox ${handle.id}`, text);
  }

  await driver.selectComboKey(handle, match.key);
}
