/**
 * Compatibility Tables
 * Static rule tables used by the item scorer and filter
 */

export const BODY_SHAPES = [
  "hourglass",
  "pear",
  "apple",
  "rectangle",
  "inverted-triangle",
  "unknown",
] as const;

export type BodyShape = (typeof BODY_SHAPES)[number];

export const ITEM_CATEGORIES = ["top", "bottom", "outerwear", "shoes", "accessories", "other"] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

type ShapeTable<T> = Readonly<Partial<Record<BodyShape, T>>>;

// Base fit score per body shape and category (default 75 when absent)
export const FIT_COMPATIBILITY: ShapeTable<Readonly<Partial<Record<ItemCategory, number>>>> = {
  hourglass: { top: 85, bottom: 80, outerwear: 75, shoes: 70, accessories: 80 },
  pear: { top: 90, bottom: 75, outerwear: 80, shoes: 75, accessories: 85 },
  apple: { top: 70, bottom: 85, outerwear: 90, shoes: 80, accessories: 75 },
  rectangle: { top: 80, bottom: 80, outerwear: 85, shoes: 75, accessories: 80 },
  "inverted-triangle": { top: 75, bottom: 90, outerwear: 70, shoes: 80, accessories: 85 },
};

export const DEFAULT_FIT_SCORE = 75;

// Each keyword found in title or description adds FIT_KEYWORD_BONUS
export const FIT_KEYWORDS: ShapeTable<readonly string[]> = {
  hourglass: ["belted", "wrap", "fitted", "cinched", "defined"],
  pear: ["flowy", "a-line", "empire", "high-waisted", "structured"],
  apple: ["v-neck", "wrap", "a-line", "empire", "flowy"],
  rectangle: ["structured", "fitted", "belted", "layered", "textured"],
  "inverted-triangle": ["wide-leg", "a-line", "flowy", "layered", "textured"],
};

export const FIT_KEYWORD_BONUS = 5;

// Keyed by free-text preferred style. Styles without an entry only score
// through direct match (90) or the 60 floor
export const STYLE_KEYWORDS: ReadonlyMap<string, readonly string[]> = new Map([
  ["vintage", ["vintage", "retro", "classic", "timeless", "antique"]],
  ["streetwear", ["street", "urban", "casual", "cool", "edgy"]],
  ["formal", ["elegant", "sophisticated", "professional", "refined"]],
  ["casual", ["relaxed", "comfortable", "everyday", "easy"]],
  ["bohemian", ["boho", "free-spirited", "artistic", "flowy"]],
  ["minimalist", ["clean", "simple", "modern", "minimal"]],
]);

export const CATEGORY_TIPS: Readonly<Partial<Record<ItemCategory, readonly string[]>>> = {
  top: ["Tuck in for a more polished look", "Layer with a jacket or cardigan"],
  bottom: ["Pair with a fitted top to balance proportions", "Consider the right footwear for the occasion"],
  outerwear: ["Layer over a simple base", "Belt it for a more defined silhouette"],
};

export const BODY_SHAPE_TIPS: ShapeTable<readonly string[]> = {
  hourglass: ["Emphasize your waist with a belt", "Choose fitted silhouettes that follow your curves"],
  pear: ["Balance with a statement top", "Draw attention upward with accessories"],
  apple: ["Create vertical lines with your outfit", "Choose pieces that skim rather than cling"],
};

export const MAX_STYLING_TIPS = 3;

/**
 * Own-property lookup, so stored or parsed keys such as "constructor" never
 * resolve to inherited members
 */
export function tableEntry<V>(table: Readonly<Record<string, V | undefined>>, key: string): V | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Normalize free-text body shape labels ("Inverted Triangle", "PEAR") to a BodyShape
 */
export function normalizeBodyShape(value: string | null | undefined): BodyShape {
  if (!value) return "unknown";
  const normalized = value.toLowerCase().trim().replace(/[\s_]+/g, "-");
  return BODY_SHAPES.find((shape) => shape === normalized) ?? "unknown";
}

/**
 * Normalize free-text category labels to an ItemCategory, "other" when unrecognized
 */
export function normalizeCategory(value: string | null | undefined): ItemCategory {
  if (!value) return "other";
  const normalized = value.toLowerCase().trim();
  return ITEM_CATEGORIES.find((category) => category === normalized) ?? "other";
}
