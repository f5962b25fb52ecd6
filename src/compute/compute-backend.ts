/**
 * Capability interface for whatever actually runs servers.
 *
 * ServerService depends on this contract only. Two implementations exist:
 * DrizzleComputeBackend (a store-backed backend that applies transitions
 * instantly) and OpenStackComputeBackend (Nova/Glance over REST, where actions
 * complete asynchronously). Nothing here assumes an action has finished when
 * its promise resolves: the returned record is whatever the backend reports.
 */
import type { ServerAction } from "./server-state-machine.js";
import type { FlavorRecord, ImageRecord, Page, ServerRecord, ServerTransition } from "./types.js";

export interface CreateServerInput {
  name: string;
  flavorId: string;
  imageId: string;
}

export interface ActionOptions {
  /** Target flavor; only read for resize. */
  flavorId?: string;
}

export interface ComputeBackend {
  createServer(input: CreateServerInput): Promise<ServerRecord>;

  /** Returns tombstoned (DELETED) servers too; callers decide visibility. */
  getServer(serverId: string): Promise<ServerRecord | null>;

  /** Non-deleted servers, newest first. */
  listServers(limit: number, offset: number): Promise<Page<ServerRecord>>;

  /**
   * Rename a server. `expectedVersion` is the version the caller read;
   * throws ConcurrentModificationError if it no longer matches.
   */
  updateServer(serverId: string, name: string, expectedVersion: number): Promise<ServerRecord>;

  /** Tombstone a server. Same version contract as updateServer. */
  deleteServer(serverId: string, expectedVersion: number): Promise<void>;

  /** Apply a lifecycle action. Same version contract as updateServer. */
  performAction(
    serverId: string,
    action: ServerAction,
    expectedVersion: number,
    options?: ActionOptions,
  ): Promise<ServerRecord>;

  getFlavor(flavorId: string): Promise<FlavorRecord | null>;

  /** Flavors ordered by name ascending. */
  listFlavors(limit: number, offset: number): Promise<Page<FlavorRecord>>;

  getImage(imageId: string): Promise<ImageRecord | null>;

  /** Images ordered by name ascending. */
  listImages(limit: number, offset: number): Promise<Page<ImageRecord>>;

  /** Lifecycle history of one server, newest first. */
  listTransitions(serverId: string, limit: number): Promise<ServerTransition[]>;
}

/**
 * Runs `work` against a backend bound to one request-scoped transactional
 * resource (a database transaction for the store-backed backend). If `work`
 * rejects, nothing it wrote is kept.
 */
export type UnitOfWork = <T>(work: (backend: ComputeBackend) => Promise<T>) => Promise<T>;
