import { randomInt, randomUUID } from "node:crypto";
import { and, asc, count, desc, eq, ne, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { flavors, images, servers, serverTransitions } from "../db/schema/index.js";
import type { ActionOptions, ComputeBackend, CreateServerInput, UnitOfWork } from "./compute-backend.js";
import { ConcurrentModificationError, InvalidStateTransitionError, ServerNotFoundError } from "./errors.js";
import { nextStatus, type ServerAction, type ServerStatus, type TransitionAction } from "./server-state-machine.js";
import type { FlavorRecord, ImageRecord, Page, ServerRecord, ServerTransition } from "./types.js";

type ServerRow = typeof servers.$inferSelect;
type TransitionRow = typeof serverTransitions.$inferSelect;

/** First and last usable host addresses of 10.0.0.0/8. */
const PRIVATE_IP_MIN = 0x0a000001;
const PRIVATE_IP_MAX = 0x0affffff;

/** Random private IPv4 address in 10.0.0.1 – 10.255.255.255. */
export function randomPrivateIp(): string {
  const n = randomInt(PRIVATE_IP_MIN, PRIVATE_IP_MAX + 1);
  return [(n >>> 24) & 0xff, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff].join(".");
}

export interface DrizzleComputeBackendOptions {
  /** Clock in epoch milliseconds. */
  now?: () => number;
  allocateIp?: () => string;
}

function toServerRecord(row: ServerRow): ServerRecord {
  return {
    id: row.id,
    name: row.name,
    status: row.status,
    flavorId: row.flavorId,
    imageId: row.imageId,
    ipAddress: row.ipAddress,
    version: row.version,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

function toTransition(row: TransitionRow): ServerTransition {
  return {
    id: row.id,
    serverId: row.serverId,
    fromStatus: row.fromStatus,
    toStatus: row.toStatus,
    action: row.action,
    createdAt: new Date(row.createdAt),
  };
}

/**
 * Compute backend that keeps servers in PostgreSQL and applies every
 * transition synchronously: create lands on ACTIVE with a synthetic private
 * IP, reboot and resize complete instantly.
 *
 * Every write is a compare-and-swap on (id, version). If another request got
 * there first, zero rows match and ConcurrentModificationError is thrown, so
 * two racing actions on one server can never both commit.
 */
export class DrizzleComputeBackend implements ComputeBackend {
  private readonly now: () => number;
  private readonly allocateIp: () => string;

  constructor(
    private readonly db: DrizzleDb,
    options: DrizzleComputeBackendOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.allocateIp = options.allocateIp ?? randomPrivateIp;
  }

  async createServer(input: CreateServerInput): Promise<ServerRecord> {
    const now = this.now();
    const [row] = await this.db
      .insert(servers)
      .values({
        id: randomUUID(),
        name: input.name,
        // No BUILD phase here: the server is usable as soon as the row exists.
        status: "ACTIVE",
        flavorId: input.flavorId,
        imageId: input.imageId,
        ipAddress: this.allocateIp(),
        version: 1,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    if (!row) throw new Error("Server insert returned no row");

    await this.recordTransition(row.id, null, row.status, "create", now);
    return toServerRecord(row);
  }

  async getServer(serverId: string): Promise<ServerRecord | null> {
    const rows = await this.db.select().from(servers).where(eq(servers.id, serverId));
    const row = rows[0];
    return row ? toServerRecord(row) : null;
  }

  async listServers(limit: number, offset: number): Promise<Page<ServerRecord>> {
    const visible = ne(servers.status, "DELETED");

    const [countRow] = await this.db.select({ count: count() }).from(servers).where(visible);
    const rows = await this.db
      .select()
      .from(servers)
      .where(visible)
      .orderBy(desc(servers.createdAt), asc(servers.id))
      .limit(limit)
      .offset(offset);

    return { items: rows.map(toServerRecord), total: countRow?.count ?? 0 };
  }

  async updateServer(serverId: string, name: string, expectedVersion: number): Promise<ServerRecord> {
    const row = await this.compareAndSwap(serverId, expectedVersion, { name });
    return toServerRecord(row);
  }

  async deleteServer(serverId: string, expectedVersion: number): Promise<void> {
    const current = await this.requireServer(serverId);
    const row = await this.compareAndSwap(serverId, expectedVersion, { status: "DELETED" });
    await this.recordTransition(serverId, current.status, "DELETED", "delete", row.updatedAt);
  }

  async performAction(
    serverId: string,
    action: ServerAction,
    expectedVersion: number,
    options: ActionOptions = {},
  ): Promise<ServerRecord> {
    const current = await this.requireServer(serverId);
    if (current.version !== expectedVersion) throw new ConcurrentModificationError(serverId);

    const target = nextStatus(current.status, action);
    if (target === null) throw new InvalidStateTransitionError(current.status, action);

    const changes: Partial<Pick<ServerRow, "status" | "flavorId">> = { status: target };
    if (action === "resize" && options.flavorId) {
      changes.flavorId = options.flavorId;
    }

    const row = await this.compareAndSwap(serverId, expectedVersion, changes);
    await this.recordTransition(serverId, current.status, target, action, row.updatedAt);
    return toServerRecord(row);
  }

  async getFlavor(flavorId: string): Promise<FlavorRecord | null> {
    const rows = await this.db.select().from(flavors).where(eq(flavors.id, flavorId));
    return rows[0] ?? null;
  }

  async listFlavors(limit: number, offset: number): Promise<Page<FlavorRecord>> {
    const [countRow] = await this.db.select({ count: count() }).from(flavors);
    const items = await this.db.select().from(flavors).orderBy(asc(flavors.name)).limit(limit).offset(offset);
    return { items, total: countRow?.count ?? 0 };
  }

  async getImage(imageId: string): Promise<ImageRecord | null> {
    const rows = await this.db.select().from(images).where(eq(images.id, imageId));
    return rows[0] ?? null;
  }

  async listImages(limit: number, offset: number): Promise<Page<ImageRecord>> {
    const [countRow] = await this.db.select({ count: count() }).from(images);
    const items = await this.db.select().from(images).orderBy(asc(images.name)).limit(limit).offset(offset);
    return { items, total: countRow?.count ?? 0 };
  }

  async listTransitions(serverId: string, limit: number): Promise<ServerTransition[]> {
    const rows = await this.db
      .select()
      .from(serverTransitions)
      .where(eq(serverTransitions.serverId, serverId))
      .orderBy(desc(serverTransitions.createdAt), desc(serverTransitions.id))
      .limit(limit);
    return rows.map(toTransition);
  }

  private async requireServer(serverId: string): Promise<ServerRecord> {
    const server = await this.getServer(serverId);
    if (!server) throw new ServerNotFoundError(serverId);
    return server;
  }

  /**
   * UPDATE ... WHERE id = ? AND version = ?; bumps version and updated_at.
   * Zero matched rows means the server vanished or moved on since it was read.
   */
  private async compareAndSwap(
    serverId: string,
    expectedVersion: number,
    changes: Partial<Pick<ServerRow, "name" | "status" | "flavorId">>,
  ): Promise<ServerRow> {
    const rows = await this.db
      .update(servers)
      .set({ ...changes, version: sql`${servers.version} + 1`, updatedAt: this.now() })
      .where(and(eq(servers.id, serverId), eq(servers.version, expectedVersion)))
      .returning();

    const row = rows[0];
    if (!row) {
      const exists = await this.getServer(serverId);
      if (!exists) throw new ServerNotFoundError(serverId);
      throw new ConcurrentModificationError(serverId);
    }
    return row;
  }

  private async recordTransition(
    serverId: string,
    fromStatus: ServerStatus | null,
    toStatus: ServerStatus,
    action: TransitionAction,
    at: number,
  ): Promise<void> {
    await this.db.insert(serverTransitions).values({
      id: randomUUID(),
      serverId,
      fromStatus,
      toStatus,
      action,
      createdAt: at,
    });
  }
}

/** Unit of work that runs each request inside one database transaction. */
export function drizzleUnitOfWork(db: DrizzleDb, options: DrizzleComputeBackendOptions = {}): UnitOfWork {
  return <T>(work: (backend: ComputeBackend) => Promise<T>): Promise<T> =>
    db.transaction((tx) => work(new DrizzleComputeBackend(tx, options)));
}
