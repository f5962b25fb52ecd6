import type { OpenStackConfig } from "../config/index.js";

/** Nova/Glance/Keystone response types (only what we need) */
export interface NovaServer {
  id: string;
  name: string;
  /** ACTIVE, BUILD, SHUTOFF, REBOOT, HARD_REBOOT, RESIZE, VERIFY_RESIZE, ERROR, SOFT_DELETED, ... */
  status: string;
  flavor: { id?: string; original_name?: string };
  /** Nova returns "" instead of an object for boot-from-volume servers */
  image: { id: string } | "";
  addresses: Record<string, Array<{ addr: string; version: number }>>;
  created: string;
  updated: string;
}

export interface NovaFlavor {
  id: string;
  name: string;
  vcpus: number;
  ram: number;
  disk: number;
}

export interface NovaInstanceAction {
  action: string;
  request_id: string;
  start_time: string;
}

export interface GlanceImage {
  id: string;
  name: string | null;
  status: string;
  size: number | null;
  min_disk: number;
  os_distro?: string;
}

/** Nova paginates listings through `servers_links` / `flavors_links`. */
interface NovaLink {
  rel: string;
  href: string;
}

interface KeystoneCatalogEntry {
  type: string;
  endpoints: Array<{ interface: string; region: string; url: string }>;
}

interface KeystoneTokenBody {
  token: { expires_at: string; catalog?: KeystoneCatalogEntry[] };
}

/** Payloads for POST /servers/{id}/action */
export type NovaActionBody =
  | { "os-start": null }
  | { "os-stop": null }
  | { reboot: { type: "SOFT" | "HARD" } }
  | { resize: { flavorRef: string } }
  | { confirmResize: null };

export class OpenStackApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly osMessage: string,
  ) {
    super(`OpenStack API error ${statusCode}: ${osMessage}`);
    this.name = "OpenStackApiError";
  }
}

interface Session {
  token: string;
  expiresAt: number;
  computeUrl: string;
  imageUrl: string;
}

/** Re-authenticate this long before Keystone says the token expires. */
const TOKEN_REFRESH_MARGIN_MS = 60_000;

/** Pull the human-readable message out of Nova/Glance/Keystone error bodies. */
function errorMessage(body: unknown, fallback: string): string {
  if (typeof body !== "object" || body === null) return fallback;
  for (const value of Object.values(body)) {
    if (typeof value === "object" && value !== null && "message" in value && typeof value.message === "string") {
      return value.message;
    }
  }
  if ("message" in body && typeof body.message === "string") return body.message;
  return fallback;
}

function nextHref(links: NovaLink[] | undefined): string | undefined {
  return links?.find((l) => l.rel === "next")?.href;
}

/**
 * Thin REST client for OpenStack Compute (Nova) and Image (Glance).
 *
 * Authenticates against Keystone v3 with a project-scoped password token and
 * resolves service endpoints from the token's catalog. The token is cached
 * until shortly before it expires.
 */
export class OpenStackClient {
  private session: Session | null = null;
  private readonly now: () => number;

  constructor(
    private readonly cfg: OpenStackConfig,
    options: { now?: () => number } = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Obtain (or reuse) a token. Also serves as the reachability probe. */
  async authenticate(): Promise<void> {
    await this.getSession();
  }

  async createServer(params: { name: string; flavorRef: string; imageRef: string }): Promise<{ id: string }> {
    return this.request<{ server: { id: string } }>("compute", "POST", "/servers", { server: params }).then(
      (r) => r.server,
    );
  }

  /** Get a server by ID; null if Nova does not know it. */
  async getServer(id: string): Promise<NovaServer | null> {
    return this.requestOrNull<{ server: NovaServer }>("compute", `/servers/${encodeURIComponent(id)}`).then(
      (r) => r?.server ?? null,
    );
  }

  /** Nova caps each response at its `max_limit`; follows `next` links to the end. */
  async listServers(): Promise<NovaServer[]> {
    const all: NovaServer[] = [];
    let path: string | undefined = "/servers/detail";
    while (path) {
      const page: { servers: NovaServer[]; servers_links?: NovaLink[] } = await this.request("compute", "GET", path);
      all.push(...page.servers);
      path = nextHref(page.servers_links);
    }
    return all;
  }

  async updateServer(id: string, name: string): Promise<NovaServer> {
    return this.request<{ server: NovaServer }>("compute", "PUT", `/servers/${encodeURIComponent(id)}`, {
      server: { name },
    }).then((r) => r.server);
  }

  async deleteServer(id: string): Promise<void> {
    await this.request("compute", "DELETE", `/servers/${encodeURIComponent(id)}`);
  }

  /** Nova answers 202 with an empty body; the work continues asynchronously. */
  async serverAction(id: string, body: NovaActionBody): Promise<void> {
    await this.request("compute", "POST", `/servers/${encodeURIComponent(id)}/action`, body);
  }

  async listInstanceActions(id: string): Promise<NovaInstanceAction[]> {
    return this.request<{ instanceActions: NovaInstanceAction[] }>(
      "compute",
      "GET",
      `/servers/${encodeURIComponent(id)}/os-instance-actions`,
    ).then((r) => r.instanceActions);
  }

  async getFlavor(id: string): Promise<NovaFlavor | null> {
    return this.requestOrNull<{ flavor: NovaFlavor }>("compute", `/flavors/${encodeURIComponent(id)}`).then(
      (r) => r?.flavor ?? null,
    );
  }

  async listFlavors(): Promise<NovaFlavor[]> {
    const all: NovaFlavor[] = [];
    let path: string | undefined = "/flavors/detail";
    while (path) {
      const page: { flavors: NovaFlavor[]; flavors_links?: NovaLink[] } = await this.request("compute", "GET", path);
      all.push(...page.flavors);
      path = nextHref(page.flavors_links);
    }
    return all;
  }

  async getImage(id: string): Promise<GlanceImage | null> {
    return this.requestOrNull<GlanceImage>("image", `/v2/images/${encodeURIComponent(id)}`);
  }

  /** Follows Glance's `next` links until every page is read. */
  async listImages(): Promise<GlanceImage[]> {
    const all: GlanceImage[] = [];
    let path: string | undefined = "/v2/images";
    while (path) {
      const page: { images: GlanceImage[]; next?: string } = await this.request("image", "GET", path);
      all.push(...page.images);
      path = page.next;
    }
    return all;
  }

  private async getSession(): Promise<Session> {
    if (this.session && this.session.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.now()) {
      return this.session;
    }

    const res = await fetch(`${this.cfg.authUrl.replace(/\/+$/, "")}/v3/auth/tokens`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        auth: {
          identity: {
            methods: ["password"],
            password: {
              user: {
                name: this.cfg.username,
                domain: { name: this.cfg.userDomain },
                password: this.cfg.password,
              },
            },
          },
          scope: {
            project: { name: this.cfg.projectName, domain: { name: this.cfg.projectDomain } },
          },
        },
      }),
    });
    if (!res.ok) {
      const body: unknown = await res.json().catch(() => null);
      throw new OpenStackApiError(res.status, errorMessage(body, res.statusText));
    }

    const token = res.headers.get("X-Subject-Token");
    if (!token) throw new OpenStackApiError(res.status, "Keystone response carried no X-Subject-Token");

    const body = (await res.json()) as KeystoneTokenBody;
    const catalog = body.token.catalog ?? [];
    this.session = {
      token,
      expiresAt: Date.parse(body.token.expires_at),
      computeUrl: this.endpoint(catalog, "compute"),
      imageUrl: this.endpoint(catalog, "image"),
    };
    return this.session;
  }

  private endpoint(catalog: KeystoneCatalogEntry[], type: string): string {
    const service = catalog.find((s) => s.type === type);
    const ep = service?.endpoints.find((e) => e.interface === "public" && e.region === this.cfg.region);
    if (!ep) {
      throw new OpenStackApiError(500, `No public ${type} endpoint in region ${this.cfg.region}`);
    }
    return ep.url.replace(/\/+$/, "");
  }

  private async requestOrNull<T>(service: "compute" | "image", path: string): Promise<T | null> {
    try {
      return await this.request<T>(service, "GET", path);
    } catch (err) {
      if (err instanceof OpenStackApiError && err.statusCode === 404) return null;
      throw err;
    }
  }

  private async request<T = unknown>(
    service: "compute" | "image",
    method: "GET" | "POST" | "PUT" | "DELETE",
    path: string,
    body?: unknown,
  ): Promise<T> {
    const session = await this.getSession();
    const base = service === "compute" ? session.computeUrl : session.imageUrl;
    // Nova's pagination links are absolute URLs.
    const url = /^https?:\/\//.test(path) ? path : `${base}${path}`;
    const res = await fetch(url, {
      method,
      headers: {
        "X-Auth-Token": session.token,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!res.ok) {
      const errBody: unknown = await res.json().catch(() => null);
      throw new OpenStackApiError(res.status, errorMessage(errBody, res.statusText));
    }
    if (res.status === 202 || res.status === 204) {
      // Action and delete responses carry no JSON, except server create (202 + body).
      const text = await res.text();
      return (text ? JSON.parse(text) : undefined) as T;
    }
    return res.json() as Promise<T>;
  }
}
