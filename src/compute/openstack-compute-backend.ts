import type { ActionOptions, ComputeBackend, CreateServerInput, UnitOfWork } from "./compute-backend.js";
import { ConcurrentModificationError, ServerNotFoundError } from "./errors.js";
import {
  type GlanceImage,
  type NovaActionBody,
  type NovaFlavor,
  type NovaServer,
  OpenStackApiError,
  type OpenStackClient,
} from "./openstack-client.js";
import {
  isServerStatus,
  SERVER_ACTIONS,
  type ServerAction,
  type ServerStatus,
  type TransitionAction,
} from "./server-state-machine.js";
import type { FlavorRecord, ImageRecord, Page, ServerRecord, ServerTransition } from "./types.js";

/** Nova statuses that have no direct counterpart in ServerStatus. */
const NOVA_STATUS_ALIASES: Record<string, ServerStatus> = {
  HARD_REBOOT: "REBOOT",
  REVERT_RESIZE: "RESIZE",
  MIGRATING: "RESIZE",
  SOFT_DELETED: "DELETED",
};

/** Nova instance-action names that differ from ours. */
const NOVA_ACTION_NAMES: Record<string, TransitionAction> = {
  confirmResize: "confirm_resize",
};

export function mapNovaStatus(status: string): ServerStatus {
  const upper = status.toUpperCase();
  const alias = NOVA_STATUS_ALIASES[upper];
  if (alias) return alias;
  // PAUSED, SUSPENDED, RESCUE, SHELVED, UNKNOWN, ...: nothing this API can act on
  return isServerStatus(upper) ? upper : "ERROR";
}

function firstIpv4(addresses: NovaServer["addresses"]): string | null {
  for (const entries of Object.values(addresses)) {
    const v4 = entries.find((a) => a.version === 4);
    if (v4) return v4.addr;
  }
  return null;
}

export function toServerRecord(server: NovaServer): ServerRecord {
  const updatedAt = new Date(server.updated);
  return {
    id: server.id,
    name: server.name,
    status: mapNovaStatus(server.status),
    flavorId: server.flavor.id ?? server.flavor.original_name ?? "",
    imageId: server.image === "" ? "" : server.image.id,
    ipAddress: firstIpv4(server.addresses),
    // Nova bumps `updated` on every state change; it stands in for a version counter.
    version: updatedAt.getTime(),
    createdAt: new Date(server.created),
    updatedAt,
  };
}

function toFlavorRecord(flavor: NovaFlavor): FlavorRecord {
  return { id: flavor.id, name: flavor.name, vcpus: flavor.vcpus, ramMb: flavor.ram, diskGb: flavor.disk };
}

function toImageRecord(image: GlanceImage): ImageRecord {
  return {
    id: image.id,
    name: image.name ?? image.id,
    osDistro: image.os_distro ?? "unknown",
    minDiskGb: image.min_disk,
    sizeBytes: image.size ?? 0,
    status: image.status,
  };
}

function toTransitionAction(novaAction: string): TransitionAction | null {
  const renamed = NOVA_ACTION_NAMES[novaAction];
  if (renamed) return renamed;
  if (novaAction === "create" || novaAction === "delete") return novaAction;
  return SERVER_ACTIONS.find((a) => a === novaAction) ?? null;
}

function actionBody(action: ServerAction, options: ActionOptions): NovaActionBody {
  switch (action) {
    case "start":
      return { "os-start": null };
    case "stop":
      return { "os-stop": null };
    case "reboot":
      return { reboot: { type: "SOFT" } };
    case "resize":
      if (!options.flavorId) throw new Error("resize requires a target flavorId");
      return { resize: { flavorRef: options.flavorId } };
    case "confirm_resize":
      return { confirmResize: null };
  }
}

function paginate<T>(all: T[], limit: number, offset: number): Page<T> {
  return { items: all.slice(offset, offset + limit), total: all.length };
}

/**
 * Compute backend that drives a real OpenStack cloud.
 *
 * Actions are asynchronous in Nova: after POST /action the server passes
 * through REBOOT, RESIZE, VERIFY_RESIZE, etc. The record returned from
 * performAction is the server as Nova reports it right after accepting the
 * request; callers re-read it to follow progress. Nova's listings carry no
 * total count, so list calls read everything and slice locally.
 */
export class OpenStackComputeBackend implements ComputeBackend {
  constructor(private readonly client: OpenStackClient) {}

  async createServer(input: CreateServerInput): Promise<ServerRecord> {
    const { id } = await this.client.createServer({
      name: input.name,
      flavorRef: input.flavorId,
      imageRef: input.imageId,
    });
    const server = await this.client.getServer(id);
    if (!server) throw new ServerNotFoundError(id);
    return toServerRecord(server);
  }

  async getServer(serverId: string): Promise<ServerRecord | null> {
    const server = await this.client.getServer(serverId);
    return server ? toServerRecord(server) : null;
  }

  async listServers(limit: number, offset: number): Promise<Page<ServerRecord>> {
    const all = (await this.client.listServers())
      .map(toServerRecord)
      .filter((s) => s.status !== "DELETED")
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return paginate(all, limit, offset);
  }

  async updateServer(serverId: string, name: string, expectedVersion: number): Promise<ServerRecord> {
    await this.assertVersion(serverId, expectedVersion);
    return toServerRecord(await this.client.updateServer(serverId, name));
  }

  async deleteServer(serverId: string, expectedVersion: number): Promise<void> {
    await this.assertVersion(serverId, expectedVersion);
    await this.client.deleteServer(serverId);
  }

  async performAction(
    serverId: string,
    action: ServerAction,
    expectedVersion: number,
    options: ActionOptions = {},
  ): Promise<ServerRecord> {
    await this.assertVersion(serverId, expectedVersion);
    try {
      await this.client.serverAction(serverId, actionBody(action, options));
    } catch (err) {
      // Nova rejects with 409 when the vm_state moved since we checked it.
      if (err instanceof OpenStackApiError && err.statusCode === 409) {
        throw new ConcurrentModificationError(serverId);
      }
      throw err;
    }
    const server = await this.client.getServer(serverId);
    if (!server) throw new ServerNotFoundError(serverId);
    return toServerRecord(server);
  }

  async getFlavor(flavorId: string): Promise<FlavorRecord | null> {
    const flavor = await this.client.getFlavor(flavorId);
    return flavor ? toFlavorRecord(flavor) : null;
  }

  async listFlavors(limit: number, offset: number): Promise<Page<FlavorRecord>> {
    const all = (await this.client.listFlavors()).map(toFlavorRecord).sort((a, b) => a.name.localeCompare(b.name));
    return paginate(all, limit, offset);
  }

  async getImage(imageId: string): Promise<ImageRecord | null> {
    const image = await this.client.getImage(imageId);
    return image ? toImageRecord(image) : null;
  }

  async listImages(limit: number, offset: number): Promise<Page<ImageRecord>> {
    const all = (await this.client.listImages())
      .map(toImageRecord)
      .sort((a, b) => a.name.localeCompare(b.name));
    return paginate(all, limit, offset);
  }

  /**
   * Nova's instance-action log. It records what was requested, not the
   * resulting status, so fromStatus/toStatus are null except for create.
   */
  async listTransitions(serverId: string, limit: number): Promise<ServerTransition[]> {
    const actions = await this.client.listInstanceActions(serverId);
    const transitions: ServerTransition[] = [];
    for (const a of actions) {
      const action = toTransitionAction(a.action);
      if (!action) continue;
      transitions.push({
        id: a.request_id,
        serverId,
        fromStatus: null,
        toStatus: action === "create" ? "BUILD" : null,
        action,
        createdAt: new Date(a.start_time),
      });
    }
    return transitions.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime()).slice(0, limit);
  }

  private async assertVersion(serverId: string, expectedVersion: number): Promise<void> {
    const current = await this.client.getServer(serverId);
    if (!current) throw new ServerNotFoundError(serverId);
    if (toServerRecord(current).version !== expectedVersion) {
      throw new ConcurrentModificationError(serverId);
    }
  }
}

/** No transaction to scope: every call goes straight to the cloud. */
export function openStackUnitOfWork(client: OpenStackClient): UnitOfWork {
  const backend = new OpenStackComputeBackend(client);
  return <T>(work: (b: ComputeBackend) => Promise<T>): Promise<T> => work(backend);
}
