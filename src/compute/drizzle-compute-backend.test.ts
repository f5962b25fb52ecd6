import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { createTestDb, seedFlavor, seedImage, truncateAllTables } from "../test/db.js";
import { DrizzleComputeBackend, drizzleUnitOfWork, randomPrivateIp } from "./drizzle-compute-backend.js";
import { ConcurrentModificationError, InvalidStateTransitionError, ServerNotFoundError } from "./errors.js";

const T0 = 1_700_000_000_000;

describe("randomPrivateIp", () => {
  it("returns an address inside 10.0.0.0/8", () => {
    for (let i = 0; i < 50; i++) {
      const octets = randomPrivateIp().split(".").map(Number);
      expect(octets).toHaveLength(4);
      expect(octets[0]).toBe(10);
      for (const o of octets) {
        expect(o).toBeGreaterThanOrEqual(0);
        expect(o).toBeLessThanOrEqual(255);
      }
      expect(octets.slice(1).some((o) => o > 0)).toBe(true);
    }
  });
});

describe("DrizzleComputeBackend", () => {
  let pool: PGlite;
  let db: DrizzleDb;
  let clock: number;
  let backend: DrizzleComputeBackend;

  const tick = () => ++clock;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    await truncateAllTables(pool);
    clock = T0;
    backend = new DrizzleComputeBackend(db, { now: tick, allocateIp: () => "10.0.0.5" });
    await seedFlavor(db, { id: "f-small", name: "m1.small" });
    await seedFlavor(db, { id: "f-large", name: "m1.large" });
    await seedImage(db, { id: "i-ubuntu", name: "Ubuntu" });
  });

  const create = (name = "web-01") => backend.createServer({ name, flavorId: "f-small", imageId: "i-ubuntu" });

  describe("createServer", () => {
    it("lands on ACTIVE with version 1 and an IP", async () => {
      const server = await create();
      expect(server.status).toBe("ACTIVE");
      expect(server.version).toBe(1);
      expect(server.ipAddress).toBe("10.0.0.5");
      expect(server.flavorId).toBe("f-small");
      expect(server.imageId).toBe("i-ubuntu");
      expect(server.createdAt.getTime()).toBe(T0 + 1);
      expect(server.updatedAt.getTime()).toBe(T0 + 1);
    });

    it("records a create transition", async () => {
      const server = await create();
      const transitions = await backend.listTransitions(server.id, 10);
      expect(transitions).toHaveLength(1);
      expect(transitions[0]).toMatchObject({ serverId: server.id, fromStatus: null, toStatus: "ACTIVE", action: "create" });
    });
  });

  describe("getServer", () => {
    it("returns null for an unknown id", async () => {
      expect(await backend.getServer("nope")).toBeNull();
    });

    it("still returns a tombstoned server", async () => {
      const server = await create();
      await backend.deleteServer(server.id, server.version);
      const tomb = await backend.getServer(server.id);
      expect(tomb?.status).toBe("DELETED");
      expect(tomb?.version).toBe(2);
    });
  });

  describe("listServers", () => {
    it("returns newest first and hides DELETED", async () => {
      const a = await create("a");
      const b = await create("b");
      const c = await create("c");
      await backend.deleteServer(b.id, b.version);

      const page = await backend.listServers(20, 0);
      expect(page.total).toBe(2);
      expect(page.items.map((s) => s.id)).toEqual([c.id, a.id]);
    });

    it("applies limit and offset against a stable total", async () => {
      for (const name of ["a", "b", "c", "d", "e"]) await create(name);
      const first = await backend.listServers(2, 0);
      const last = await backend.listServers(2, 4);
      expect(first.total).toBe(5);
      expect(last.total).toBe(5);
      expect(first.items.map((s) => s.name)).toEqual(["e", "d"]);
      expect(last.items.map((s) => s.name)).toEqual(["a"]);
    });
  });

  describe("updateServer", () => {
    it("renames and bumps version", async () => {
      const server = await create();
      const updated = await backend.updateServer(server.id, "web-02", 1);
      expect(updated.name).toBe("web-02");
      expect(updated.version).toBe(2);
      expect(updated.updatedAt.getTime()).toBe(T0 + 2);
      expect(updated.createdAt.getTime()).toBe(T0 + 1);
    });

    it("throws ConcurrentModificationError on a stale version", async () => {
      const server = await create();
      await backend.updateServer(server.id, "web-02", 1);
      await expect(backend.updateServer(server.id, "web-03", 1)).rejects.toBeInstanceOf(ConcurrentModificationError);
      expect((await backend.getServer(server.id))?.name).toBe("web-02");
    });

    it("throws ServerNotFoundError for an unknown id", async () => {
      await expect(backend.updateServer("nope", "x", 1)).rejects.toBeInstanceOf(ServerNotFoundError);
    });

    it("lets exactly one of two writers with the same version win", async () => {
      const server = await create();
      const results = await Promise.allSettled([
        backend.updateServer(server.id, "left", server.version),
        backend.updateServer(server.id, "right", server.version),
      ]);
      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(ConcurrentModificationError);
      expect((await backend.getServer(server.id))?.version).toBe(2);
    });
  });

  describe("deleteServer", () => {
    it("tombstones and records a delete transition", async () => {
      const server = await create();
      await backend.deleteServer(server.id, 1);
      const transitions = await backend.listTransitions(server.id, 10);
      expect(transitions.map((t) => t.action)).toEqual(["delete", "create"]);
      expect(transitions[0]).toMatchObject({ fromStatus: "ACTIVE", toStatus: "DELETED" });
    });

    it("throws ServerNotFoundError for an unknown id", async () => {
      await expect(backend.deleteServer("nope", 1)).rejects.toBeInstanceOf(ServerNotFoundError);
    });
  });

  describe("performAction", () => {
    it("stop then start round-trips through SHUTOFF", async () => {
      const server = await create();
      const stopped = await backend.performAction(server.id, "stop", 1);
      expect(stopped.status).toBe("SHUTOFF");
      expect(stopped.version).toBe(2);
      const started = await backend.performAction(server.id, "start", 2);
      expect(started.status).toBe("ACTIVE");
      expect(started.version).toBe(3);
    });

    it("resize switches flavor and stays ACTIVE", async () => {
      const server = await create();
      const resized = await backend.performAction(server.id, "resize", 1, { flavorId: "f-large" });
      expect(resized.status).toBe("ACTIVE");
      expect(resized.flavorId).toBe("f-large");
    });

    it("reboot keeps the flavor", async () => {
      const server = await create();
      const rebooted = await backend.performAction(server.id, "reboot", 1, { flavorId: "f-large" });
      expect(rebooted.status).toBe("ACTIVE");
      expect(rebooted.flavorId).toBe("f-small");
    });

    it("rejects an action the current status does not allow", async () => {
      const server = await create();
      await expect(backend.performAction(server.id, "start", 1)).rejects.toBeInstanceOf(InvalidStateTransitionError);
      expect((await backend.getServer(server.id))?.version).toBe(1);
    });

    it("rejects a stale version before checking the table", async () => {
      const server = await create();
      await backend.performAction(server.id, "stop", 1);
      await expect(backend.performAction(server.id, "start", 1)).rejects.toBeInstanceOf(ConcurrentModificationError);
    });

    it("writes one transition per action, newest first", async () => {
      const server = await create();
      await backend.performAction(server.id, "stop", 1);
      await backend.performAction(server.id, "start", 2);
      const transitions = await backend.listTransitions(server.id, 10);
      expect(transitions.map((t) => [t.action, t.fromStatus, t.toStatus])).toEqual([
        ["start", "SHUTOFF", "ACTIVE"],
        ["stop", "ACTIVE", "SHUTOFF"],
        ["create", null, "ACTIVE"],
      ]);
    });

    it("honours the transitions limit", async () => {
      const server = await create();
      await backend.performAction(server.id, "reboot", 1);
      await backend.performAction(server.id, "reboot", 2);
      const transitions = await backend.listTransitions(server.id, 2);
      expect(transitions.map((t) => t.action)).toEqual(["reboot", "reboot"]);
    });
  });

  describe("catalog", () => {
    it("looks up flavors and images by id", async () => {
      expect(await backend.getFlavor("f-small")).toEqual({
        id: "f-small",
        name: "m1.small",
        vcpus: 1,
        ramMb: 1024,
        diskGb: 10,
      });
      expect(await backend.getFlavor("nope")).toBeNull();
      expect((await backend.getImage("i-ubuntu"))?.name).toBe("Ubuntu");
      expect(await backend.getImage("nope")).toBeNull();
    });

    it("lists flavors by name", async () => {
      const page = await backend.listFlavors(1, 0);
      expect(page.total).toBe(2);
      expect(page.items.map((f) => f.name)).toEqual(["m1.large"]);
    });

    it("lists images with a total", async () => {
      const page = await backend.listImages(20, 0);
      expect(page.total).toBe(1);
      expect(page.items[0]?.sizeBytes).toBe(1024);
    });
  });
});

describe("drizzleUnitOfWork", () => {
  let pool: PGlite;
  let db: DrizzleDb;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
    await seedFlavor(db, { id: "f-1" });
    await seedImage(db, { id: "i-1" });
  });

  afterAll(async () => {
    await pool.close();
  });

  it("commits the work when it resolves", async () => {
    const uow = drizzleUnitOfWork(db);
    const server = await uow((b) => b.createServer({ name: "kept", flavorId: "f-1", imageId: "i-1" }));
    expect(await new DrizzleComputeBackend(db).getServer(server.id)).not.toBeNull();
  });

  it("rolls back every write when the work throws", async () => {
    const uow = drizzleUnitOfWork(db);
    let createdId = "";
    await expect(
      uow(async (b) => {
        const server = await b.createServer({ name: "discarded", flavorId: "f-1", imageId: "i-1" });
        createdId = server.id;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(createdId).not.toBe("");
    const backend = new DrizzleComputeBackend(db);
    expect(await backend.getServer(createdId)).toBeNull();
    expect(await backend.listTransitions(createdId, 10)).toEqual([]);
  });
});
