import { count } from "drizzle-orm";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "./index.js";
import { flavors, images } from "./schema/index.js";

type FlavorRow = typeof flavors.$inferInsert;
type ImageRow = typeof images.$inferInsert;

// Fixed IDs so clients and fixtures can rely on them across restarts.
export const SEED_FLAVORS: readonly FlavorRow[] = [
  { id: "11111111-0000-0000-0000-000000000001", name: "m1.tiny", vcpus: 1, ramMb: 512, diskGb: 1 },
  { id: "11111111-0000-0000-0000-000000000002", name: "m1.small", vcpus: 1, ramMb: 2048, diskGb: 20 },
  { id: "11111111-0000-0000-0000-000000000003", name: "m1.medium", vcpus: 2, ramMb: 4096, diskGb: 40 },
  { id: "11111111-0000-0000-0000-000000000004", name: "m1.large", vcpus: 4, ramMb: 8192, diskGb: 80 },
  { id: "11111111-0000-0000-0000-000000000005", name: "m1.xlarge", vcpus: 8, ramMb: 16384, diskGb: 160 },
];

export const SEED_IMAGES: readonly ImageRow[] = [
  {
    id: "22222222-0000-0000-0000-000000000001",
    name: "Ubuntu 22.04 LTS",
    osDistro: "ubuntu",
    minDiskGb: 8,
    sizeBytes: 2361393152,
    status: "active",
  },
  {
    id: "22222222-0000-0000-0000-000000000002",
    name: "Debian 12",
    osDistro: "debian",
    minDiskGb: 8,
    sizeBytes: 1073741824,
    status: "active",
  },
  {
    id: "22222222-0000-0000-0000-000000000003",
    name: "CentOS Stream 9",
    osDistro: "centos",
    minDiskGb: 10,
    sizeBytes: 1610612736,
    status: "active",
  },
  {
    id: "22222222-0000-0000-0000-000000000004",
    name: "Fedora 39",
    osDistro: "fedora",
    minDiskGb: 8,
    sizeBytes: 1879048192,
    status: "active",
  },
];

/**
 * Insert the default flavor and image catalog. Each table is only seeded
 * when empty, so operator-provisioned catalogs are left alone.
 */
export async function seedCatalog(db: DrizzleDb): Promise<{ flavors: number; images: number }> {
  const inserted = { flavors: 0, images: 0 };

  const [flavorCount] = await db.select({ count: count() }).from(flavors);
  if ((flavorCount?.count ?? 0) === 0) {
    await db.insert(flavors).values([...SEED_FLAVORS]);
    inserted.flavors = SEED_FLAVORS.length;
    logger.info("Seed flavors inserted", { count: SEED_FLAVORS.length });
  }

  const [imageCount] = await db.select({ count: count() }).from(images);
  if ((imageCount?.count ?? 0) === 0) {
    await db.insert(images).values([...SEED_IMAGES]);
    inserted.images = SEED_IMAGES.length;
    logger.info("Seed images inserted", { count: SEED_IMAGES.length });
  }

  return inserted;
}
