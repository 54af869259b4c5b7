import {
  MATERIAL_CATEGORIES,
  MATERIAL_KEYWORDS,
  type MaterialCategory,
} from "../patterns";

/**
 * Material categories mentioned anywhere in the text. One keyword hit is
 * enough; the result lists each category once, in lexicon order.
 */
export function extractMaterials(text: string): MaterialCategory[] {
  const lower = text.toLowerCase();
  return MATERIAL_CATEGORIES.filter((category) =>
    MATERIAL_KEYWORDS[category].some((keyword) => lower.includes(keyword))
  );
}
