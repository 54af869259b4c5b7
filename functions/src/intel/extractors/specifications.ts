import {
  MIN_SPEC_LENGTH,
  SPEC_CUE_KEYWORDS,
  SPEC_STANDARD_CODES,
  TECHNICAL_PATTERNS,
} from "../patterns";

function looksLikeSpecification(lower: string) {
  return (
    SPEC_CUE_KEYWORDS.some((k) => lower.includes(k)) ||
    SPEC_STANDARD_CODES.test(lower) ||
    TECHNICAL_PATTERNS.some((p) => p.test(lower))
  );
}

/**
 * Lines that read like technical requirements (cue words, sizes, grades,
 * standards codes), trimmed and deduplicated in first-seen order.
 */
export function extractSpecifications(text: string): string[] {
  const seen = new Set<string>();
  for (const line of text.split("\n")) {
    const clean = line.trim();
    if (clean.length <= MIN_SPEC_LENGTH) continue;
    if (!looksLikeSpecification(clean.toLowerCase())) continue;
    seen.add(clean);
  }
  return [...seen];
}
