/**
 * Document Store
 * Key-value JSON documents with load / save / append.
 * Supabase-backed in production, in-memory when Supabase is not configured.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { UpstreamUnavailableError } from "../utils/errors.js";
import { DOCUMENTS_TABLE } from "./supabase.js";

export interface DocumentStore {
  load<T>(key: string, fallback: T): Promise<T>;
  save<T>(key: string, value: T): Promise<void>;
  /** Append to the array stored under `key`; a non-array value becomes the first element */
  append<T>(key: string, value: T): Promise<void>;
}

export const DOCUMENT_KEYS = {
  items: "items",
  feedback: "feedback",
  preferences: "preferences",
  activityLog: "activity_log",
  trendingSnapshot: "trending_snapshot",
} as const;

function toArray(existing: unknown): unknown[] {
  if (Array.isArray(existing)) return existing;
  if (existing === null || existing === undefined) return [];
  return [existing];
}

/**
 * Stores serialized JSON so callers never share references with the store
 */
export class MemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, string>();

  async load<T>(key: string, fallback: T): Promise<T> {
    const raw = this.documents.get(key);
    if (raw === undefined) return fallback;
    return JSON.parse(raw);
  }

  async save<T>(key: string, value: T): Promise<void> {
    this.documents.set(key, JSON.stringify(value));
  }

  async append<T>(key: string, value: T): Promise<void> {
    const existing = toArray(await this.load<unknown>(key, []));
    existing.push(value);
    await this.save(key, existing);
  }
}

/**
 * One row per key in the `documents` table (key text primary key, value jsonb).
 * Appends are read-modify-write: concurrent appends to one key may race.
 */
export class SupabaseDocumentStore implements DocumentStore {
  constructor(private readonly client: SupabaseClient) {}

  async load<T>(key: string, fallback: T): Promise<T> {
    const { data, error } = await this.client
      .from(DOCUMENTS_TABLE)
      .select("value")
      .eq("key", key)
      .maybeSingle();

    if (error) {
      console.error(`[Store] Failed to load ${key}:`, error);
      throw new UpstreamUnavailableError(`Failed to load ${key}: ${error.message}`, error);
    }

    if (!data || data.value === null || data.value === undefined) return fallback;
    return data.value;
  }

  async save<T>(key: string, value: T): Promise<void> {
    const { error } = await this.client.from(DOCUMENTS_TABLE).upsert({
      key,
      value,
      updated_at: new Date().toISOString(),
    });

    if (error) {
      console.error(`[Store] Failed to save ${key}:`, error);
      throw new UpstreamUnavailableError(`Failed to save ${key}: ${error.message}`, error);
    }
  }

  async append<T>(key: string, value: T): Promise<void> {
    const existing = toArray(await this.load<unknown>(key, []));
    existing.push(value);
    await this.save(key, existing);
  }
}
