import { Hono } from "hono";
import type { UnitOfWork } from "../../compute/compute-backend.js";
import { FlavorService } from "../../compute/catalog-service.js";
import { buildPage, paginationQuerySchema } from "../pagination.js";
import { toFlavorResponse } from "../serializers.js";
import { parseQuery } from "../validation.js";

export function createFlavorRoutes(uow: UnitOfWork): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    const query = parseQuery(c, paginationQuerySchema);
    const page = await uow((backend) => new FlavorService(backend).list(query.limit, query.offset));
    return c.json(buildPage(page.items.map(toFlavorResponse), page.total, query));
  });

  routes.get("/:id", async (c) => {
    const flavor = await uow((backend) => new FlavorService(backend).get(c.req.param("id")));
    return c.json(toFlavorResponse(flavor));
  });

  return routes;
}
