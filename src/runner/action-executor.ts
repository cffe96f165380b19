import type { Action } from '../types/index.js';
import type { Session } from '../driver/index.js';
import { VKey } from '../driver/index.js';
import { ActionConfigurationError } from '../exception/index.js';
import type { EventLogger } from '../logging/run-logger.js';

export function toActionList(actions: Action | Action[]): Action[] {
  return Array.isArray(actions) ? actions : [actions];
}

/**
 * Execute one or more actions in order.
 */
export async function executeActions(
  session: Session,
  actions: Action | Action[],
  logger: EventLogger,
  screen?: string,
): Promise<void> {
  for (const action of toActionList(actions)) {
    await logger.log({
      level: 'info',
      event: 'action_executed',
      message: `Executing ${action.type} action${action.description ? `: ${action.description}` : ''}`,
      screen,
      action: action.type,
    });
    await executeAction(session, action, logger, screen);
  }
}

async function executeAction(
  session: Session,
  action: Action,
  logger: EventLogger,
  screen?: string,
): Promise<void> {
  switch (action.type) {
    case 'click': {
      if (!action.targetId) {
        throw new ActionConfigurationError(
          `Target ID is required for click action${action.description ? `: ${action.description}` : ''}`,
        );
      }
      const target = await session.findOptional(action.targetId);
      if (!target) {
        // Navigation already happened, e.g. the tab is open on re-entry.
        await logger.log({
          level: 'warn',
          event: 'click_target_missing',
          message: `Target element '${action.targetId}' not found. Assuming already executed entry action.`,
          screen,
          target: action.targetId,
        });
        return;
      }
      await session.driver.click(target);
      return;
    }
    case 'press_enter':
      await session.pressEnter();
      return;
    case 'dismiss_popups':
      await session.dismissPopups();
      return;
    case 'back':
      await session.sendKey(VKey.BACK);
      return;
    case 'send_vkey':
      if (action.vkey === undefined) {
        throw new ActionConfigurationError(
          `Virtual key is required for send_vkey action${action.description ? `: ${action.description}` : ''}`,
        );
      }
      await session.sendKey(action.vkey);
      return;
    default:
      throw new ActionConfigurationError(`Unknown action type: ${JSON.stringify(action)}`);
  }
}
