import { z } from "zod";
import { SERVER_ACTIONS, type ServerStatus, type TransitionAction } from "./server-state-machine.js";

export interface ServerRecord {
  id: string;
  name: string;
  status: ServerStatus;
  flavorId: string;
  imageId: string;
  ipAddress: string | null;
  /** Optimistic-concurrency stamp; every mutation must present the version it read. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface FlavorRecord {
  id: string;
  name: string;
  vcpus: number;
  ramMb: number;
  diskGb: number;
}

export interface ImageRecord {
  id: string;
  name: string;
  osDistro: string;
  minDiskGb: number;
  sizeBytes: number;
  status: string;
}

export interface ServerTransition {
  id: string;
  serverId: string;
  /** null for the create event */
  fromStatus: ServerStatus | null;
  /** null when the backend only reports that an action was requested */
  toStatus: ServerStatus | null;
  action: TransitionAction;
  createdAt: Date;
}

/** A window of records plus the size of the full filtered set. */
export interface Page<T> {
  items: T[];
  total: number;
}

// ---------------------------------------------------------------------------
// Request schemas (wire format is snake_case)
// ---------------------------------------------------------------------------

const serverNameSchema = z.string().min(1).max(255);

export const createServerSchema = z.object({
  name: serverNameSchema,
  flavor_id: z.string().min(1),
  image_id: z.string().min(1),
});
export type CreateServerBody = z.infer<typeof createServerSchema>;

export const updateServerSchema = z.object({
  name: serverNameSchema.nullish(),
});
export type UpdateServerBody = z.infer<typeof updateServerSchema>;

/** flavor_id is required for resize and rejected for every other action. */
export const serverActionSchema = z
  .object({
    action: z.enum(SERVER_ACTIONS),
    flavor_id: z.string().min(1).nullish(),
  })
  .superRefine((body, ctx) => {
    if (body.action === "resize" && !body.flavor_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["flavor_id"],
        message: "flavor_id is required for resize action",
      });
    }
    if (body.action !== "resize" && body.flavor_id != null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["flavor_id"],
        message: "flavor_id is only allowed for resize action",
      });
    }
  });
export type ServerActionBody = z.infer<typeof serverActionSchema>;
