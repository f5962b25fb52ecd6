import { type Context, Hono } from "hono";
import type { RequestIdVariables } from "hono/request-id";
import { z } from "zod";
import type { ComputeBackend, UnitOfWork } from "../../compute/compute-backend.js";
import { ServerService } from "../../compute/server-service.js";
import { createServerSchema, serverActionSchema, updateServerSchema } from "../../compute/types.js";
import { logger } from "../../config/logger.js";
import { buildPage, MAX_PAGE_LIMIT, paginationQuerySchema } from "../pagination.js";
import { toServerResponse, toTransitionResponse } from "../serializers.js";
import { parseBody, parseQuery } from "../validation.js";

const DEFAULT_TRANSITION_LIMIT = 50;

const transitionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_TRANSITION_LIMIT),
});

type ServerRoutesEnv = { Variables: RequestIdVariables };

/** Engine factory whose log records carry the request's ID. */
function servicesFor(c: Context<ServerRoutesEnv>): (backend: ComputeBackend) => ServerService {
  const log = logger.child({ requestId: c.get("requestId") });
  return (backend) => new ServerService(backend, log);
}

/** /api/v1/servers */
export function createServerRoutes(uow: UnitOfWork): Hono<ServerRoutesEnv> {
  const routes = new Hono<ServerRoutesEnv>();

  routes.post("/", async (c) => {
    const service = servicesFor(c);
    const body = await parseBody(c, createServerSchema);
    const server = await uow((backend) =>
      service(backend).create({ name: body.name, flavorId: body.flavor_id, imageId: body.image_id }),
    );
    return c.json(toServerResponse(server), 201);
  });

  routes.get("/", async (c) => {
    const service = servicesFor(c);
    const query = parseQuery(c, paginationQuerySchema);
    const page = await uow((backend) => service(backend).list(query.limit, query.offset));
    return c.json(buildPage(page.items.map(toServerResponse), page.total, query));
  });

  routes.get("/:id", async (c) => {
    const service = servicesFor(c);
    const server = await uow((backend) => service(backend).get(c.req.param("id")));
    return c.json(toServerResponse(server));
  });

  routes.patch("/:id", async (c) => {
    const service = servicesFor(c);
    const body = await parseBody(c, updateServerSchema);
    const server = await uow((backend) => service(backend).update(c.req.param("id"), { name: body.name }));
    return c.json(toServerResponse(server));
  });

  routes.delete("/:id", async (c) => {
    const service = servicesFor(c);
    await uow((backend) => service(backend).delete(c.req.param("id")));
    return c.body(null, 204);
  });

  // POST /:id/action -- 202: against a real cloud the transition is still in flight
  routes.post("/:id/action", async (c) => {
    const service = servicesFor(c);
    const body = await parseBody(c, serverActionSchema);
    const server = await uow((backend) =>
      service(backend).performAction(c.req.param("id"), body.action, body.flavor_id),
    );
    return c.json(toServerResponse(server), 202);
  });

  routes.get("/:id/transitions", async (c) => {
    const service = servicesFor(c);
    const { limit } = parseQuery(c, transitionsQuerySchema);
    const transitions = await uow((backend) => service(backend).listTransitions(c.req.param("id"), limit));
    return c.json({ items: transitions.map(toTransitionResponse) });
  });

  return routes;
}
