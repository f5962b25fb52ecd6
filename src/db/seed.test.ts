import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "../config/logger.js";
import { createTestDb, seedFlavor, truncateAllTables } from "../test/db.js";
import type { DrizzleDb } from "./index.js";
import { flavors, images } from "./schema/index.js";
import { SEED_FLAVORS, SEED_IMAGES, seedCatalog } from "./seed.js";

describe("seedCatalog", () => {
  let pool: PGlite;
  let db: DrizzleDb;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    vi.clearAllMocks();
    await truncateAllTables(pool);
  });

  it("fills empty catalog tables", async () => {
    expect(await seedCatalog(db)).toEqual({ flavors: 5, images: 4 });
    const flavorRows = await db.select().from(flavors);
    const imageRows = await db.select().from(images);
    expect(flavorRows.map((f) => f.name).sort()).toEqual(["m1.large", "m1.medium", "m1.small", "m1.tiny", "m1.xlarge"]);
    expect(imageRows).toHaveLength(SEED_IMAGES.length);
    expect(logger.info).toHaveBeenCalledWith("Seed flavors inserted", { count: 5 });
    expect(logger.info).toHaveBeenCalledWith("Seed images inserted", { count: 4 });
  });

  it("is idempotent", async () => {
    await seedCatalog(db);
    expect(await seedCatalog(db)).toEqual({ flavors: 0, images: 0 });
    expect(await db.select().from(flavors)).toHaveLength(SEED_FLAVORS.length);
  });

  it("leaves an operator-provisioned table alone", async () => {
    await seedFlavor(db, { id: "custom", name: "c1.custom" });
    expect(await seedCatalog(db)).toEqual({ flavors: 0, images: 4 });
    const rows = await db.select().from(flavors);
    expect(rows.map((f) => f.id)).toEqual(["custom"]);
  });

  it("keeps large image sizes exact", async () => {
    await seedCatalog(db);
    const ubuntu = (await db.select().from(images)).find((i) => i.osDistro === "ubuntu");
    expect(ubuntu?.sizeBytes).toBe(2361393152);
  });
});
