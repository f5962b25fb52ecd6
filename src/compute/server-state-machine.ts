/**
 * Server lifecycle state machine: pure logic, no dependencies.
 *
 * This is the single source of truth for which user actions a server accepts
 * in each status. ServerService checks it before touching the backend, and
 * DrizzleComputeBackend applies it when it writes the new status.
 */

export const SERVER_STATUSES = [
  "BUILD",
  "ACTIVE",
  "SHUTOFF",
  "REBOOT",
  "RESIZE",
  "VERIFY_RESIZE",
  "ERROR",
  "DELETED",
] as const;

export type ServerStatus = (typeof SERVER_STATUSES)[number];

export const SERVER_ACTIONS = ["start", "stop", "reboot", "resize", "confirm_resize"] as const;

export type ServerAction = (typeof SERVER_ACTIONS)[number];

/** Everything recorded in a server's lifecycle history: user actions plus create and delete. */
export const TRANSITION_ACTIONS = ["create", ...SERVER_ACTIONS, "delete"] as const;

export type TransitionAction = (typeof TRANSITION_ACTIONS)[number];

/**
 * Complete transition table for user-initiated actions.
 *
 * ```
 * ACTIVE        → stop: SHUTOFF, reboot: ACTIVE, resize: ACTIVE
 * SHUTOFF       → start: ACTIVE
 * VERIFY_RESIZE → confirm_resize: ACTIVE
 * BUILD, REBOOT, RESIZE, ERROR, DELETED → (none)
 * ```
 *
 * reboot and resize land straight back on ACTIVE: the store-backed backend
 * completes them instantly. A real cloud reports REBOOT/RESIZE/VERIFY_RESIZE
 * while the work is in flight, and those statuses accept no user action.
 */
export const ACTION_TRANSITIONS: Record<ServerStatus, Readonly<Partial<Record<ServerAction, ServerStatus>>>> = {
  BUILD: {},
  ACTIVE: { stop: "SHUTOFF", reboot: "ACTIVE", resize: "ACTIVE" },
  SHUTOFF: { start: "ACTIVE" },
  REBOOT: {},
  RESIZE: {},
  VERIFY_RESIZE: { confirm_resize: "ACTIVE" },
  ERROR: {},
  DELETED: {},
};

/** Status a server ends in after `action`, or null if the action is not allowed from `from`. */
export function nextStatus(from: ServerStatus, action: ServerAction): ServerStatus | null {
  return ACTION_TRANSITIONS[from][action] ?? null;
}

export function isValidAction(from: ServerStatus, action: ServerAction): boolean {
  return nextStatus(from, action) !== null;
}

/** Actions a caller may request against a server in `status`, in table order. */
export function allowedActions(status: ServerStatus): ServerAction[] {
  return SERVER_ACTIONS.filter((action) => isValidAction(status, action));
}

export function isServerStatus(value: string): value is ServerStatus {
  return SERVER_STATUSES.some((status) => status === value);
}
