import { Hono } from "hono";
import type { AppDeps } from "../app.js";
import { DEFAULT_SEARCH_LIMIT } from "../services/catalog.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { handleRouteError, queryNumber, readJsonBody } from "../utils/http.js";
import { isRecord, parseCatalogItems } from "../utils/validation.js";

const MAX_SEARCH_LIMIT = 100;

export function createCatalogRoutes(deps: AppDeps) {
  const catalog = new Hono();

  /**
   * GET / - Search the catalog
   * Query: keyword (empty returns everything), max_items
   */
  catalog.get("/", async (c) => {
    try {
      const keyword = c.req.query("keyword") ?? "";
      const limit = queryNumber(c.req.query("max_items"), DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT);
      const items = await deps.catalog.search(keyword, limit);
      return c.json({ items, count: items.length });
    } catch (err) {
      return handleRouteError(c, err, "Catalog");
    }
  });

  /**
   * POST / - Insert or replace items by id
   * Body: { items: CatalogItem[] }
   */
  catalog.post("/", async (c) => {
    try {
      const body = await readJsonBody(c);
      if (!isRecord(body)) {
        throw new InvalidArgumentError("Request body must be a JSON object");
      }

      const items = parseCatalogItems(body.items);
      const total = await deps.catalog.upsert(items);
      return c.json({ upserted: items.length, total }, 201);
    } catch (err) {
      return handleRouteError(c, err, "Catalog");
    }
  });

  catalog.get("/:id", async (c) => {
    try {
      const item = await deps.catalog.getById(c.req.param("id"));
      return c.json({ item });
    } catch (err) {
      return handleRouteError(c, err, "Catalog");
    }
  });

  return catalog;
}
