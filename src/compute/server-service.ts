import type { Logger } from "winston";
import { logger } from "../config/logger.js";
import type { ComputeBackend } from "./compute-backend.js";
import {
  FlavorNotFoundError,
  ImageNotFoundError,
  InvalidStateTransitionError,
  ServerDeletedError,
  ServerNotFoundError,
} from "./errors.js";
import { isValidAction, type ServerAction } from "./server-state-machine.js";
import type { Page, ServerRecord, ServerTransition } from "./types.js";

export interface CreateServerParams {
  name: string;
  flavorId: string;
  imageId: string;
}

/** The slice of the logger the engine writes to; routes pass a per-request child. */
export type ServiceLogger = Pick<Logger, "info" | "warn">;

export interface UpdateServerParams {
  /** Omitted or null keeps the current name. */
  name?: string | null;
}

/**
 * Server lifecycle engine.
 *
 * Enforces the state machine on top of a ComputeBackend. Every precondition
 * (existence, tombstone, referenced flavor/image, allowed action) is checked
 * here before the backend is asked to change anything.
 *
 * Visibility rules: a DELETED server does not exist for get, delete and
 * performAction (404), but exists-and-is-immutable for update (409). A missing
 * ID always wins over a state problem.
 */
export class ServerService {
  constructor(
    private readonly backend: ComputeBackend,
    private readonly log: ServiceLogger = logger,
  ) {}

  async create(params: CreateServerParams): Promise<ServerRecord> {
    const flavor = await this.backend.getFlavor(params.flavorId);
    if (!flavor) throw new FlavorNotFoundError(params.flavorId);

    const image = await this.backend.getImage(params.imageId);
    if (!image) throw new ImageNotFoundError(params.imageId);

    const server = await this.backend.createServer(params);
    this.log.info("Server created", {
      serverId: server.id,
      serverName: server.name,
      flavorId: server.flavorId,
      imageId: server.imageId,
      status: server.status,
    });
    return server;
  }

  async get(serverId: string): Promise<ServerRecord> {
    const server = await this.backend.getServer(serverId);
    if (!server || server.status === "DELETED") throw new ServerNotFoundError(serverId);
    return server;
  }

  async list(limit: number, offset: number): Promise<Page<ServerRecord>> {
    return this.backend.listServers(limit, offset);
  }

  async update(serverId: string, params: UpdateServerParams): Promise<ServerRecord> {
    const server = await this.backend.getServer(serverId);
    if (!server) throw new ServerNotFoundError(serverId);
    if (server.status === "DELETED") throw new ServerDeletedError(serverId);

    const name = params.name ?? server.name;
    const updated = await this.backend.updateServer(serverId, name, server.version);
    this.log.info("Server updated", { serverId, serverName: updated.name });
    return updated;
  }

  async delete(serverId: string): Promise<void> {
    const server = await this.get(serverId);
    await this.backend.deleteServer(serverId, server.version);
    this.log.info("Server deleted", { serverId, fromStatus: server.status });
  }

  async performAction(serverId: string, action: ServerAction, flavorId?: string | null): Promise<ServerRecord> {
    const server = await this.get(serverId);

    if (!isValidAction(server.status, action)) {
      this.log.warn("Invalid state transition attempt", {
        serverId,
        currentStatus: server.status,
        action,
      });
      throw new InvalidStateTransitionError(server.status, action);
    }

    let targetFlavorId: string | undefined;
    if (action === "resize" && flavorId) {
      const flavor = await this.backend.getFlavor(flavorId);
      if (!flavor) throw new FlavorNotFoundError(flavorId);
      targetFlavorId = flavor.id;
    }

    this.log.info("State transition", { serverId, fromStatus: server.status, action });
    const result = await this.backend.performAction(serverId, action, server.version, { flavorId: targetFlavorId });
    this.log.info("State transition complete", { serverId, action, newStatus: result.status });
    return result;
  }

  /** Lifecycle history, newest first. Tombstoned servers keep their history. */
  async listTransitions(serverId: string, limit: number): Promise<ServerTransition[]> {
    const server = await this.backend.getServer(serverId);
    if (!server) throw new ServerNotFoundError(serverId);
    return this.backend.listTransitions(serverId, limit);
  }
}
