import type { ServerStatus, TransitionAction } from "../compute/server-state-machine.js";
import type { FlavorRecord, ImageRecord, ServerRecord, ServerTransition } from "../compute/types.js";

/** Wire shapes: snake_case, ISO-8601 timestamps. */

export interface ServerResponse {
  id: string;
  name: string;
  status: ServerStatus;
  flavor_id: string;
  image_id: string;
  ip_address: string | null;
  created_at: string;
  updated_at: string;
}

export interface FlavorResponse {
  id: string;
  name: string;
  vcpus: number;
  ram_mb: number;
  disk_gb: number;
}

export interface ImageResponse {
  id: string;
  name: string;
  os_distro: string;
  min_disk_gb: number;
  size_bytes: number;
  status: string;
}

export interface TransitionResponse {
  id: string;
  from_status: ServerStatus | null;
  to_status: ServerStatus | null;
  action: TransitionAction;
  created_at: string;
}

export function toServerResponse(s: ServerRecord): ServerResponse {
  return {
    id: s.id,
    name: s.name,
    status: s.status,
    flavor_id: s.flavorId,
    image_id: s.imageId,
    ip_address: s.ipAddress,
    created_at: s.createdAt.toISOString(),
    updated_at: s.updatedAt.toISOString(),
  };
}

export function toFlavorResponse(f: FlavorRecord): FlavorResponse {
  return { id: f.id, name: f.name, vcpus: f.vcpus, ram_mb: f.ramMb, disk_gb: f.diskGb };
}

export function toImageResponse(i: ImageRecord): ImageResponse {
  return {
    id: i.id,
    name: i.name,
    os_distro: i.osDistro,
    min_disk_gb: i.minDiskGb,
    size_bytes: i.sizeBytes,
    status: i.status,
  };
}

export function toTransitionResponse(t: ServerTransition): TransitionResponse {
  return {
    id: t.id,
    from_status: t.fromStatus,
    to_status: t.toStatus,
    action: t.action,
    created_at: t.createdAt.toISOString(),
  };
}
