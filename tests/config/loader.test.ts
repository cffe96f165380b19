import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import { buildScreenMap, loadTransactionConfig, loadRunData } from '../../src/config/loader.js';
import { CallableRegistry } from '../../src/config/callable-registry.js';
import { ActionConfigurationError, ElementConfigurationError, ScreenMappingError } from '../../src/exception/index.js';

const validTransaction = {
  transactionCode: 'ORD1',
  screenOrder: ['Header', 'ACTION_CLICK_wnd[0]/tbar[1]/btn[5]', { name: 'Items', tableColumns: { items: ['Material'] } }],
  options: { writeRetry: { attempts: 2, delayMs: 250 } },
};

const validScreens = [
  {
    name: 'Header',
    elements: [
      { id: 'wnd[0]/usr/ctxtCUSTOMER', type: 'text', name: 'customer' },
      { type: 'callable', name: 'longText', fn: 'fillLongText' },
    ],
  },
  {
    name: 'Items',
    onEntry: { type: 'click', targetId: 'wnd[0]/usr/tabsTAB/tabpT02' },
    elements: [{ id: 'wnd[0]/usr/tblITEMS', type: 'table', name: 'items' }],
  },
];

describe('loadTransactionConfig', () => {
  let configDir: string;
  let registry: CallableRegistry;
  const fillLongText = async () => {};

  async function writeConfig(transaction: unknown, screens: unknown) {
    await mkdir(configDir, { recursive: true });
    await Promise.all([
      writeFile(join(configDir, 'transaction.json'), JSON.stringify(transaction)),
      writeFile(join(configDir, 'screens.json'), JSON.stringify(screens)),
    ]);
  }

  beforeEach(() => {
    configDir = join(tmpdir(), `config-loader-test-${randomUUID()}`);
    registry = new CallableRegistry();
    registry.register('fillLongText', fillLongText);
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it('loads the screen map and resolves the order', async () => {
    await writeConfig(validTransaction, validScreens);
    const config = await loadTransactionConfig(configDir, registry);

    expect(config.transactionCode).toBe('ORD1');
    expect(Object.keys(config.screenMap)).toEqual(['Header', 'Items']);
    expect(config.screenOrder).toEqual([
      { kind: 'screen', name: 'Header' },
      { kind: 'action', action: { type: 'click', targetId: 'wnd[0]/tbar[1]/btn[5]' } },
      { kind: 'screen', name: 'Items', tableColumns: { items: ['Material'] } },
    ]);
    expect(config.writeRetry).toEqual({ attempts: 2, delayMs: 250 });
  });

  it('binds callable elements to registered functions', async () => {
    await writeConfig(validTransaction, validScreens);
    const config = await loadTransactionConfig(configDir, registry);

    const callable = config.screenMap.Header.elements[1];
    expect(callable).toEqual({ type: 'callable', name: 'longText', func: fillLongText });
  });

  it('uses the screen file order when no order is configured', async () => {
    await writeConfig({ transactionCode: 'ORD1' }, validScreens);
    const config = await loadTransactionConfig(configDir, registry);

    expect(config.screenOrder).toEqual([
      { kind: 'screen', name: 'Header' },
      { kind: 'screen', name: 'Items' },
    ]);
    expect(config.writeRetry).toBeUndefined();
  });

  it('rejects an order that names an unknown screen', async () => {
    await writeConfig({ transactionCode: 'ORD1', screenOrder: ['Header', 'Partners'] }, validScreens);
    await expect(loadTransactionConfig(configDir, registry)).rejects.toThrow(
      new ScreenMappingError('Screen order references unknown screen: Partners'),
    );
  });

  it('rejects an unknown action token', async () => {
    await writeConfig({ transactionCode: 'ORD1', screenOrder: ['ACTION_SAVE'] }, validScreens);
    await expect(loadTransactionConfig(configDir, registry)).rejects.toBeInstanceOf(ActionConfigurationError);
  });

  it('rejects an order that names an inherited object member', async () => {
    await writeConfig({ transactionCode: 'ORD1', screenOrder: ['toString'] }, validScreens);
    await expect(loadTransactionConfig(configDir, registry)).rejects.toThrow(
      new ScreenMappingError('Screen order references unknown screen: toString'),
    );
  });

  it('rejects a screen defined twice', async () => {
    await writeConfig(validTransaction, [...validScreens, validScreens[0]]);
    await expect(loadTransactionConfig(configDir, registry)).rejects.toThrow(
      new ScreenMappingError('Screen "Header" is defined more than once'),
    );
  });

  it('rejects a callable that is not registered', async () => {
    await writeConfig(validTransaction, validScreens);
    await expect(loadTransactionConfig(configDir, new CallableRegistry())).rejects.toThrow(
      new ElementConfigurationError('Callable "fillLongText" is not registered (element: longText)'),
    );
  });

  it('rejects an invalid screens file', async () => {
    await writeConfig(validTransaction, [{ name: 'Header', elements: [{ id: 'ctxtCUSTOMER', type: 'text', name: 'c' }] }]);
    await expect(loadTransactionConfig(configDir, registry)).rejects.toBeInstanceOf(ZodError);
  });

  it('fails when transaction.json is missing', async () => {
    await mkdir(configDir, { recursive: true });
    await writeFile(join(configDir, 'screens.json'), JSON.stringify(validScreens));
    await expect(loadTransactionConfig(configDir, registry)).rejects.toThrow();
  });
});

describe('buildScreenMap', () => {
  it('maps screens named like object members as own entries', () => {
    const map = buildScreenMap(
      [
        { name: 'constructor', elements: [] },
        { name: '__proto__', elements: [] },
      ],
      new CallableRegistry(),
    );

    expect(Object.keys(map)).toEqual(['constructor', '__proto__']);
    expect(Object.hasOwn(map, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(map)).toBe(Object.prototype);
  });

  it('still rejects a real duplicate', () => {
    expect(() =>
      buildScreenMap(
        [
          { name: 'constructor', elements: [] },
          { name: 'constructor', elements: [] },
        ],
        new CallableRegistry(),
      ),
    ).toThrow(new ScreenMappingError('Screen "constructor" is defined more than once'));
  });
});

describe('loadRunData', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `run-data-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads records and screen overrides', async () => {
    const file = join(dir, 'data.json');
    const content = { data: [{ Material: 'M-0', Quantity: 2 }], screenData: { Header: { customer: 'C-1' } } };
    await writeFile(file, JSON.stringify(content));

    expect(await loadRunData(file)).toEqual(content);
  });

  it('rejects malformed data', async () => {
    const file = join(dir, 'data.json');
    await writeFile(file, JSON.stringify({ data: 'C-1' }));

    await expect(loadRunData(file)).rejects.toBeInstanceOf(ZodError);
  });
});
