import type { Action, RawScreenOrderEntry, ScreenMap, ScreenOrderEntry } from '../types/index.js';
import { ActionConfigurationError } from '../exception/index.js';

export const ACTION_TOKEN_PREFIX = 'ACTION_';

const SIMPLE_TOKENS: Record<string, Action> = {
  PRESS_ENTER: { type: 'press_enter' },
  DISMISS_POPUPS: { type: 'dismiss_popups' },
  BACK: { type: 'back' },
};

/**
 * Decode a legacy action token such as `ACTION_CLICK_wnd[0]/tbar[1]/btn[5]`
 * or `ACTION_SEND_VKEY_11`.
 */
export function decodeActionToken(token: string): Action {
  if (!token.startsWith(ACTION_TOKEN_PREFIX)) {
    throw new ActionConfigurationError(`Not an action token: ${token}`);
  }
  const body = token.slice(ACTION_TOKEN_PREFIX.length);

  if (body.startsWith('CLICK_')) {
    const targetId = body.slice('CLICK_'.length);
    if (!targetId) {
      throw new ActionConfigurationError(`Click token without target: ${token}`);
    }
    return { type: 'click', targetId };
  }

  if (body.startsWith('SEND_VKEY_')) {
    const raw = body.slice('SEND_VKEY_'.length);
    if (!/^\d+$/.test(raw)) {
      throw new ActionConfigurationError(`Invalid virtual key in token: ${token}`);
    }
    return { type: 'send_vkey', vkey: Number(raw) };
  }

  const simple = SIMPLE_TOKENS[body];
  if (!simple) {
    throw new ActionConfigurationError(`Unknown action token: ${token}`);
  }
  return { ...simple };
}

/** Configured order entries, raw or already resolved by the loader. */
export type ScreenOrderInput = RawScreenOrderEntry | ScreenOrderEntry;

function isResolved(entry: ScreenOrderInput): entry is ScreenOrderEntry {
  return typeof entry === 'object' && 'kind' in entry;
}

export function resolveOrderEntry(entry: ScreenOrderInput): ScreenOrderEntry {
  if (isResolved(entry)) {
    return entry;
  }

  if (typeof entry === 'string') {
    if (entry.startsWith(ACTION_TOKEN_PREFIX)) {
      return { kind: 'action', action: decodeActionToken(entry) };
    }
    return { kind: 'screen', name: entry };
  }

  if ('action' in entry) {
    return { kind: 'action', action: entry.action };
  }

  return { kind: 'screen', ...entry };
}

/**
 * Resolve the configured order once, up front. Without an order the screen
 * map's insertion order is used.
 */
export function buildScreenOrder(
  order: ScreenOrderInput[] | undefined,
  screenMap: ScreenMap,
): ScreenOrderEntry[] {
  const raw: ScreenOrderInput[] = order && order.length > 0 ? order : Object.keys(screenMap);
  return raw.map(resolveOrderEntry);
}
