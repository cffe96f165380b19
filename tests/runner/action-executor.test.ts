import { describe, it, expect, beforeEach } from 'vitest';
import { executeActions } from '../../src/runner/action-executor.js';
import { Session } from '../../src/driver/index.js';
import { ActionConfigurationError } from '../../src/exception/index.js';
import type { Action } from '../../src/types/index.js';
import { FakeDriver, MemoryLogger } from '../helpers/fake-driver.js';

describe('executeActions', () => {
  let driver: FakeDriver;
  let session: Session;
  let logger: MemoryLogger;

  beforeEach(() => {
    driver = new FakeDriver();
    session = new Session(driver);
    logger = new MemoryLogger();
  });

  it('clicks a located target', async () => {
    driver.addButton('wnd[0]/tbar[1]/btn[5]');
    await executeActions(session, { type: 'click', targetId: 'wnd[0]/tbar[1]/btn[5]' }, logger);

    expect(driver.calls).toEqual(['locate wnd[0]/tbar[1]/btn[5]', 'click wnd[0]/tbar[1]/btn[5]']);
  });

  it('logs and continues when the click target is missing', async () => {
    await executeActions(session, { type: 'click', targetId: 'wnd[0]/usr/tabsT/tabpT_02' }, logger, 'Items');

    expect(driver.calls).toEqual(['locate wnd[0]/usr/tabsT/tabpT_02']);
    const warning = logger.events.find((e) => e.event === 'click_target_missing');
    expect(warning).toMatchObject({ level: 'warn', screen: 'Items', target: 'wnd[0]/usr/tabsT/tabpT_02' });
  });

  it('runs a list of actions in order', async () => {
    const actions: Action[] = [
      { type: 'press_enter' },
      { type: 'dismiss_popups' },
      { type: 'back' },
      { type: 'send_vkey', vkey: 11 },
    ];
    await executeActions(session, actions, logger);

    expect(driver.calls).toEqual(['key 0@0x1', 'dismiss', 'key 3@0x1', 'key 11@0x1']);
    expect(logger.names()).toEqual(['action_executed', 'action_executed', 'action_executed', 'action_executed']);
  });

  it('rejects a click without a target', async () => {
    await expect(executeActions(session, { type: 'click', description: 'Open items tab' }, logger)).rejects.toThrow(
      new ActionConfigurationError('Target ID is required for click action: Open items tab'),
    );
    expect(driver.calls).toEqual([]);
  });

  it('rejects send_vkey without a key', async () => {
    await expect(executeActions(session, { type: 'send_vkey' }, logger)).rejects.toBeInstanceOf(
      ActionConfigurationError,
    );
  });

  it('rejects an unknown action type', async () => {
    const untyped: unknown = JSON.parse('{"type":"double_click"}');
    await expect(executeActions(session, untyped as Action, logger)).rejects.toBeInstanceOf(
      ActionConfigurationError,
    );
  });
});
