import { Hono } from "hono";
import type { UnitOfWork } from "../../compute/compute-backend.js";
import { ImageService } from "../../compute/catalog-service.js";
import { buildPage, paginationQuerySchema } from "../pagination.js";
import { toImageResponse } from "../serializers.js";
import { parseQuery } from "../validation.js";

export function createImageRoutes(uow: UnitOfWork): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    const query = parseQuery(c, paginationQuerySchema);
    const page = await uow((backend) => new ImageService(backend).list(query.limit, query.offset));
    return c.json(buildPage(page.items.map(toImageResponse), page.total, query));
  });

  routes.get("/:id", async (c) => {
    const image = await uow((backend) => new ImageService(backend).get(c.req.param("id")));
    return c.json(toImageResponse(image));
  });

  return routes;
}
