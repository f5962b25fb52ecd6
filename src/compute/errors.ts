import type { ServerAction, ServerStatus } from "./server-state-machine.js";

/** HTTP statuses the error taxonomy maps onto. */
export type ComputeErrorStatus = 404 | 409 | 422;

/**
 * Base class for every failure the lifecycle engine raises on purpose.
 *
 * Each subclass carries a stable machine-readable `code` and the transport
 * status it maps to. Anything that is not a ComputeError reaching the HTTP
 * boundary is treated as an internal error and never shown to the caller.
 */
export abstract class ComputeError extends Error {
  abstract readonly code: string;
  abstract readonly status: ComputeErrorStatus;

  constructor(
    message: string,
    readonly details: Record<string, unknown> | unknown[] | null = null,
  ) {
    super(message);
  }
}

export class ServerNotFoundError extends ComputeError {
  readonly name = "ServerNotFoundError" as const;
  readonly code = "SERVER_NOT_FOUND";
  readonly status = 404;
  constructor(readonly serverId: string) {
    super(`Server ${serverId} not found`);
  }
}

export class FlavorNotFoundError extends ComputeError {
  readonly name = "FlavorNotFoundError" as const;
  readonly code = "FLAVOR_NOT_FOUND";
  readonly status = 404;
  constructor(readonly flavorId: string) {
    super(`Flavor ${flavorId} not found`);
  }
}

export class ImageNotFoundError extends ComputeError {
  readonly name = "ImageNotFoundError" as const;
  readonly code = "IMAGE_NOT_FOUND";
  readonly status = 404;
  constructor(readonly imageId: string) {
    super(`Image ${imageId} not found`);
  }
}

/** The action exists, but not from the server's current status. */
export class InvalidStateTransitionError extends ComputeError {
  readonly name = "InvalidStateTransitionError" as const;
  readonly code = "INVALID_STATE_TRANSITION";
  readonly status = 409;
  constructor(
    readonly currentStatus: ServerStatus,
    readonly action: ServerAction,
  ) {
    super(`Cannot perform action '${action}' on server in status '${currentStatus}'`, {
      current_status: currentStatus,
      action,
    });
  }
}

/** Mutation attempted on a tombstoned server: it exists, but is immutable. */
export class ServerDeletedError extends ComputeError {
  readonly name = "ServerDeletedError" as const;
  readonly code = "SERVER_DELETED";
  readonly status = 409;
  constructor(readonly serverId: string) {
    super(`Server ${serverId} has been deleted and cannot be modified`);
  }
}

/** Thrown when a compare-and-swap update finds the server was changed concurrently. */
export class ConcurrentModificationError extends ComputeError {
  readonly name = "ConcurrentModificationError" as const;
  readonly code = "CONCURRENT_MODIFICATION";
  readonly status = 409;
  constructor(readonly serverId: string) {
    super(`Server ${serverId} was modified by another request; re-read it and retry`);
  }
}

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

/** Malformed or missing request fields, rejected before the engine runs. */
export class RequestValidationError extends ComputeError {
  readonly name = "RequestValidationError" as const;
  readonly code = "VALIDATION_ERROR";
  readonly status = 422;
  constructor(readonly issues: ValidationIssue[]) {
    super("Request validation failed", issues);
  }
}
