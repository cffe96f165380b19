interface BaseAction {
  description?: string;
}

export interface ClickAction extends BaseAction {
  type: 'click';
  targetId?: string;
}

export interface PressEnterAction extends BaseAction {
  type: 'press_enter';
}

export interface DismissPopupsAction extends BaseAction {
  type: 'dismiss_popups';
}

export interface BackAction extends BaseAction {
  type: 'back';
}

export interface SendVKeyAction extends BaseAction {
  type: 'send_vkey';
  vkey?: number;
}

export type Action =
  | ClickAction
  | PressEnterAction
  | DismissPopupsAction
  | BackAction
  | SendVKeyAction;

export type ActionType = Action['type'];
