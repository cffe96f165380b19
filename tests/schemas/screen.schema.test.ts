import { describe, it, expect } from 'vitest';
import { ActionSchema, ActionListSchema } from '../../src/schemas/action.schema.js';
import { ScreenSchema, ScreensFileSchema, ScreenOrderEntrySchema } from '../../src/schemas/screen.schema.js';

describe('ActionSchema', () => {
  it('validates a click action', () => {
    const valid = { type: 'click', targetId: 'wnd[0]/usr/tabsTAB/tabpT02', description: 'Open items tab' };
    expect(ActionSchema.parse(valid)).toEqual(valid);
  });

  it('validates a send_vkey action', () => {
    expect(ActionSchema.parse({ type: 'send_vkey', vkey: 11 })).toEqual({ type: 'send_vkey', vkey: 11 });
  });

  it('rejects a negative virtual key', () => {
    expect(() => ActionSchema.parse({ type: 'send_vkey', vkey: -1 })).toThrow();
  });

  it('rejects an unknown action type', () => {
    expect(() => ActionSchema.parse({ type: 'double_click' })).toThrow();
  });

  it('accepts a single action or a list', () => {
    expect(ActionListSchema.parse({ type: 'back' })).toEqual({ type: 'back' });
    expect(ActionListSchema.parse([{ type: 'press_enter' }, { type: 'dismiss_popups' }])).toHaveLength(2);
  });
});

describe('ScreenSchema', () => {
  const header = {
    name: 'Header',
    elements: [{ id: 'wnd[0]/usr/ctxtCUSTOMER', type: 'text', name: 'customer' }],
    onEntry: { type: 'click', targetId: 'wnd[0]/usr/tabsTAB/tabpT01' },
    pressEnter: false,
  };

  it('validates a screen with entry actions', () => {
    expect(ScreenSchema.parse(header)).toEqual(header);
  });

  it('accepts a screen without elements', () => {
    expect(ScreenSchema.parse({ name: 'Overview', elements: [] }).elements).toEqual([]);
  });

  it('rejects a screen without a name', () => {
    expect(() => ScreenSchema.parse({ elements: [] })).toThrow();
  });

  it('requires at least one screen in a screens file', () => {
    expect(() => ScreensFileSchema.parse([])).toThrow();
    expect(ScreensFileSchema.parse([header])).toHaveLength(1);
  });
});

describe('ScreenOrderEntrySchema', () => {
  it('accepts screen names and action tokens', () => {
    expect(ScreenOrderEntrySchema.parse('Header')).toBe('Header');
    expect(ScreenOrderEntrySchema.parse('ACTION_PRESS_ENTER')).toBe('ACTION_PRESS_ENTER');
  });

  it('accepts a structured action entry', () => {
    const entry = { action: { type: 'back' } };
    expect(ScreenOrderEntrySchema.parse(entry)).toEqual(entry);
  });

  it('accepts a screen reference with column selections', () => {
    const entry = { name: 'Items', tableColumns: { items: ['Material', 'Quantity'] } };
    expect(ScreenOrderEntrySchema.parse(entry)).toEqual(entry);
  });

  it('rejects an empty screen name', () => {
    expect(() => ScreenOrderEntrySchema.parse('')).toThrow();
  });
});
