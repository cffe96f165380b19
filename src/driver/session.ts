import type { StatusInfo } from '../types/index.js';
import type { ElementHandle, UiDriver } from './ui-driver.js';
import { MAIN_WINDOW, POPUP_WINDOW, VKey } from './ui-driver.js';
import { ElementNotFoundError, TransactionError } from '../exception/index.js';
import type { ErrorFactory } from '../exception/index.js';

/**
 * Higher-level helpers over a {@link UiDriver}: confirm keys, status checks
 * and the commit sequence shared by screens and tables.
 */
export class Session {
  constructor(readonly driver: UiDriver) {}

  async locate(id: string): Promise<ElementHandle> {
    const handle = await this.driver.locate(id, true);
    if (!handle) {
      throw new ElementNotFoundError(`The element with ID: ${id} was not found`, id);
    }
    return handle;
  }

  async findOptional(id: string): Promise<ElementHandle | null> {
    return this.driver.locate(id, false);
  }

  async sendKey(key: number, windowIndex: number = MAIN_WINDOW, repeat: number = 1): Promise<void> {
    await this.driver.sendKey(windowIndex, key, repeat);
  }

  async pressEnter(windowIndex: number = MAIN_WINDOW): Promise<void> {
    await this.sendKey(VKey.ENTER, windowIndex);
  }

  async dismissPopups(): Promise<void> {
    await this.driver.dismissTransientPopups();
  }

  /**
   * Raise through `createError` when the status line carries an error.
   * Returns the status otherwise.
   */
  async raiseForStatus(createError: ErrorFactory, prefix?: string): Promise<StatusInfo> {
    const status = await this.driver.status();
    if (status.severity !== 'error') return status;

    throw createError(prefix ? `${prefix}: ${status.text}` : status.text);
  }

  /**
   * Raise through `createError` when a blocking dialog is open, with the
   * dialog's title and text as the message.
   */
  async raiseIfErrorDialog(
    createError: ErrorFactory,
    prefix?: string,
    windowIndex: number = POPUP_WINDOW,
  ): Promise<void> {
    const dialog = await this.driver.errorDialog(windowIndex);
    if (!dialog) return;

    const detail = dialog.text ? `${dialog.title}: ${dialog.text}` : dialog.title;
    throw createError(prefix ? `${prefix}: ${detail}` : detail);
  }

  /** Confirm, clear transient popups, then fail on an error status. */
  async commit(createError: ErrorFactory, prefix?: string): Promise<StatusInfo> {
    await this.pressEnter();
    await this.dismissPopups();
    return this.raiseForStatus(createError, prefix);
  }

  async startTransaction(code: string): Promise<void> {
    await this.driver.startTransaction(code);

    const status = await this.driver.status();
    if (status.severity === 'error' || status.text.toLowerCase().includes('does not exist')) {
      throw new TransactionError(`Transaction ${code} failed: ${status.text}`);
    }
  }

  /**
   * First standalone number in the status text, e.g. the id in
   * "Order 4711 has been saved".
   */
  async documentNumber(): Promise<number | null> {
    const { text } = await this.driver.status();
    const match = /\b\d+\b/.exec(text);
    return match ? Number(match[0]) : null;
  }
}
