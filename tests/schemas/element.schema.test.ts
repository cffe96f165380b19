import { describe, it, expect } from 'vitest';
import { ControlElementSchema, CallableElementSchema, ElementSchema } from '../../src/schemas/element.schema.js';

describe('ControlElementSchema', () => {
  it('validates a text field', () => {
    const valid = { id: 'wnd[0]/usr/ctxtCUSTOMER', type: 'text', name: 'customer' };
    expect(ControlElementSchema.parse(valid)).toEqual(valid);
  });

  it('keeps an optional description', () => {
    const valid = { id: 'wnd[0]/usr/tblITEMS', type: 'table', name: 'items', description: 'Item grid' };
    expect(ControlElementSchema.parse(valid)).toEqual(valid);
  });

  it('rejects an id that is not window scoped', () => {
    const result = ControlElementSchema.safeParse({ id: 'usr/ctxtCUSTOMER', type: 'text', name: 'customer' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Element id must start with a window reference such as wnd[0]');
    }
  });

  it('rejects an unknown type', () => {
    expect(() => ControlElementSchema.parse({ id: 'wnd[0]/usr/x', type: 'slider', name: 'x' })).toThrow();
  });

  it('rejects an empty name', () => {
    expect(() => ControlElementSchema.parse({ id: 'wnd[0]/usr/x', type: 'text', name: '' })).toThrow();
  });
});

describe('CallableElementSchema', () => {
  it('validates a callable without an id', () => {
    const valid = { type: 'callable', name: 'longText', fn: 'fillLongText' };
    expect(CallableElementSchema.parse(valid)).toEqual(valid);
  });

  it('rejects a callable without a function name', () => {
    expect(() => CallableElementSchema.parse({ type: 'callable', name: 'longText' })).toThrow();
  });
});

describe('ElementSchema', () => {
  it('accepts both element shapes', () => {
    expect(ElementSchema.parse({ type: 'callable', name: 'a', fn: 'f' }).type).toBe('callable');
    expect(ElementSchema.parse({ id: 'wnd[1]/usr/btnOK', type: 'button', name: 'ok' }).type).toBe('button');
  });

  it('rejects a control element without an id', () => {
    expect(() => ElementSchema.parse({ type: 'text', name: 'customer' })).toThrow();
  });
});
