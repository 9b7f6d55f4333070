/**
 * Item Filter
 * Narrows a catalog to items matching a profile's style and color preferences
 */

import type { CatalogItem, UserProfile } from "./models.js";

type FilterProfile = Pick<UserProfile, "preferred_style" | "recommended_colors">;

/**
 * Style gate: substring match in either direction, or any word of the
 * preferred style found inside the item's style
 */
export function matchesStyle(preferredStyle: string, itemStyle: string): boolean {
  const userStyle = preferredStyle.toLowerCase().trim();
  if (!userStyle) return true;

  const style = itemStyle.toLowerCase();
  if (style.includes(userStyle) || userStyle.includes(style)) return true;

  return userStyle.split(/\s+/).some((token) => style.includes(token));
}

/**
 * Color gate: any recommended color equals any item color, ignoring case
 */
export function matchesColors(recommendedColors: readonly string[], itemColors: readonly string[]): boolean {
  if (recommendedColors.length === 0) return true;

  const wanted = new Set(recommendedColors.map((color) => color.toLowerCase().trim()));
  return itemColors.some((color) => wanted.has(color.toLowerCase().trim()));
}

export function filterItems<T extends CatalogItem>(profile: FilterProfile, items: readonly T[]): T[] {
  return items.filter(
    (item) =>
      matchesStyle(profile.preferred_style, item.style) &&
      matchesColors(profile.recommended_colors, item.colors)
  );
}

/**
 * Filter, falling back to the whole catalog when nothing passes
 */
export function filterWithFallback<T extends CatalogItem>(profile: FilterProfile, items: readonly T[]): T[] {
  const filtered = filterItems(profile, items);

  if (filtered.length === 0 && items.length > 0) {
    console.warn(`[Filter] No items match preferences, using all ${items.length} catalog items`);
    return [...items];
  }

  return filtered;
}
