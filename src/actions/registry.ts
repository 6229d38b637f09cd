/** All logical actions, in their fixed enumeration order. */
export const ALL_LOGICAL_ACTIONS = [
  "ExitGame",
  "Select1",
  "Select2",
  "Select3",
  "Select4",
  "SelectAtCursor",
  "MoveTo",
  "ActionAt",
  "Retreat",
  "Advance",
  "StatusItemNext",
  "StatusItemPrev",
  "Chat",
  "ViewLeft",
  "ViewRight",
  "ViewUp",
  "ViewDown",
  "ZoomOut",
  "ZoomIn",
] as const;

export type LogicalAction = (typeof ALL_LOGICAL_ACTIONS)[number];

export const ACTION_COUNT = ALL_LOGICAL_ACTIONS.length;

const ACTION_NAMES: Readonly<Record<LogicalAction, string>> = {
  ActionAt: "Action At Cursor",
  Advance: "Advance",
  Chat: "Chat",
  ExitGame: "Exit Game",
  MoveTo: "Move To Cursor",
  Retreat: "Retreat",
  Select1: "Select Squad 1",
  Select2: "Select Squad 2",
  Select3: "Select Squad 3",
  Select4: "Select Squad 4",
  SelectAtCursor: "Select At Cursor",
  StatusItemNext: "Next Status Item",
  StatusItemPrev: "Previous Status Item",
  ViewDown: "Move View Down",
  ViewLeft: "Move View Left",
  ViewRight: "Move View Right",
  ViewUp: "Move View Up",
  ZoomIn: "Zoom In",
  ZoomOut: "Zoom Out",
};

const ACTION_INDEX: ReadonlyMap<string, number> = new Map(
  ALL_LOGICAL_ACTIONS.map((action, i) => [action, i]),
);

export function isLogicalAction(u: unknown): u is LogicalAction {
  return typeof u === "string" && ACTION_INDEX.has(u);
}

/**
 * Position of an action in the enumeration. Values that are not part of
 * the closed enumeration are programmer errors and throw.
 */
export function actionIndex(action: LogicalAction): number {
  const index = ACTION_INDEX.get(action);
  if (index === undefined) {
    throw new Error(`Unknown action: ${String(action)}`);
  }
  return index;
}

export function actionAt(index: number): LogicalAction {
  const action = ALL_LOGICAL_ACTIONS[index];
  if (!Number.isInteger(index) || action === undefined) {
    throw new Error(`Invalid action index: ${String(index)}`);
  }
  return action;
}

export function getActionName(action: LogicalAction): string {
  if (!isLogicalAction(action)) {
    throw new Error(`Invalid action index: ${String(action)}`);
  }
  return ACTION_NAMES[action];
}
