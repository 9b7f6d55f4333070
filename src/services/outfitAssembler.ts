/**
 * Outfit Assembler
 * Builds complete outfits from ranked items, one piece per slot.
 * Each slot draws at random from its few best items so repeated outfits
 * vary without dropping far down the ranking.
 */

import type { ItemCategory } from "../constants/compatibility.js";
import { MAX_OUTFITS } from "../constants/scoring.js";
import { mean, roundTo } from "../utils/numbers.js";
import { defaultRandom, pickRandom, type RandomSource } from "../utils/random.js";
import type { ScoredItem } from "./itemScorer.js";

// Slot order within an outfit and how many top items each slot draws from
const OUTFIT_SLOTS: readonly { category: ItemCategory; pool: number }[] = [
  { category: "top", pool: 3 },
  { category: "bottom", pool: 3 },
  { category: "outerwear", pool: 2 },
  { category: "shoes", pool: 2 },
  { category: "accessories", pool: 2 },
];

const SINGLE_ITEM_COHESION = 50;
const MIN_COHESION = 20;
const COHESION_PENALTY_PER_STYLE = 20;

export interface Outfit {
  outfit_id: string;
  items: ScoredItem[];
  total_score: number;
  style_cohesion: number;
  created_at: string;
}

export interface AssembleOptions {
  random?: RandomSource;
  now?: Date;
}

function groupByCategory(items: readonly ScoredItem[]): Map<ItemCategory, ScoredItem[]> {
  const groups = new Map<ItemCategory, ScoredItem[]>();

  for (const item of items) {
    const group = groups.get(item.category);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.category, [item]);
    }
  }

  for (const group of groups.values()) {
    group.sort((a, b) => b.overall_score - a.overall_score);
  }

  return groups;
}

/**
 * Fewer distinct style tags means a more cohesive outfit
 */
export function calculateStyleCohesion(items: readonly Pick<ScoredItem, "style">[]): number {
  if (items.length < 2) return SINGLE_ITEM_COHESION;

  const uniqueStyles = new Set(items.map((item) => item.style.toLowerCase())).size;
  return roundTo(Math.max(MIN_COHESION, 100 - uniqueStyles * COHESION_PENALTY_PER_STYLE), 1);
}

export function assembleOutfits(items: readonly ScoredItem[], options: AssembleOptions = {}): Outfit[] {
  const random = options.random ?? defaultRandom;
  const createdAt = (options.now ?? new Date()).toISOString();
  const groups = groupByCategory(items);
  const outfitCount = Math.min(MAX_OUTFITS, items.length);

  const outfits: Outfit[] = [];

  for (let i = 0; i < outfitCount; i++) {
    const members: ScoredItem[] = [];

    for (const slot of OUTFIT_SLOTS) {
      const pool = (groups.get(slot.category) ?? []).slice(0, slot.pool);
      const picked = pickRandom(pool, random);
      if (picked) members.push(picked);
    }

    // An empty outfit keeps zero scores
    outfits.push({
      outfit_id: `outfit_${i + 1}`,
      items: members,
      total_score: members.length > 0 ? roundTo(mean(members.map((m) => m.overall_score)), 1) : 0,
      style_cohesion: members.length > 0 ? calculateStyleCohesion(members) : 0,
      created_at: createdAt,
    });
  }

  return outfits;
}
