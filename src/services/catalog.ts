/**
 * Catalog Service
 * Read/write access to the catalog items document. The catalog is authoritative
 * for item existence (trending drops ids it does not know).
 */

import { NotFoundError, UpstreamUnavailableError, isServiceError, errorMessage } from "../utils/errors.js";
import { DOCUMENT_KEYS, type DocumentStore } from "./documentStore.js";
import type { CatalogItem } from "./models.js";

export const DEFAULT_SEARCH_LIMIT = 20;

export interface CatalogSource {
  search(keyword: string, maxItems?: number): Promise<CatalogItem[]>;
  getAll(): Promise<CatalogItem[]>;
}

function matchesKeyword(item: CatalogItem, keyword: string): boolean {
  const haystack = [item.style, item.title, item.description, ...(item.tags ?? [])]
    .join(" ")
    .toLowerCase();

  // Any word of the keyword is enough ("vintage streetwear" finds vintage items)
  return keyword
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .some((word) => haystack.includes(word));
}

export class CatalogService implements CatalogSource {
  constructor(private readonly store: DocumentStore) {}

  async getAll(): Promise<CatalogItem[]> {
    try {
      return await this.store.load<CatalogItem[]>(DOCUMENT_KEYS.items, []);
    } catch (err) {
      if (isServiceError(err)) throw err;
      throw new UpstreamUnavailableError(`Catalog unavailable: ${errorMessage(err)}`, err);
    }
  }

  async search(keyword: string, maxItems: number = DEFAULT_SEARCH_LIMIT): Promise<CatalogItem[]> {
    const items = await this.getAll();
    const trimmed = keyword.trim();
    const matches = trimmed ? items.filter((item) => matchesKeyword(item, trimmed)) : items;

    console.log(`[Catalog] Search "${trimmed}" matched ${matches.length}/${items.length} items`);

    return matches.slice(0, Math.max(0, maxItems));
  }

  async getById(itemId: string): Promise<CatalogItem> {
    const items = await this.getAll();
    const item = items.find((i) => i.id === itemId);
    if (!item) {
      throw new NotFoundError(`Item ${itemId} not found`);
    }
    return item;
  }

  /**
   * Insert or replace items by id; returns the catalog size afterwards
   */
  async upsert(items: readonly CatalogItem[]): Promise<number> {
    const existing = await this.getAll();
    const byId = new Map(existing.map((item) => [item.id, item]));

    for (const item of items) {
      byId.set(item.id, item);
    }

    const merged = [...byId.values()];
    await this.store.save(DOCUMENT_KEYS.items, merged);

    console.log(`[Catalog] Upserted ${items.length} items (catalog size ${merged.length})`);
    return merged.length;
  }
}
