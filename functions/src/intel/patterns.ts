/**
 * Static lexicons and regex rule sets used by the extractors.
 *
 * Every table here is frozen at load and shared by all calls. Global regexes
 * are only ever consumed through `String#matchAll`, which works on a copy, so
 * their `lastIndex` is never touched.
 */

export const MATERIAL_CATEGORIES = [
  "piping",
  "valves",
  "flanges",
  "fittings",
  "bolts",
  "gaskets",
  "finned_tubes",
] as const;

export type MaterialCategory = (typeof MATERIAL_CATEGORIES)[number];

// substring match against lowercased text
export const MATERIAL_KEYWORDS: Readonly<
  Record<MaterialCategory, readonly string[]>
> = Object.freeze({
  piping: ["pipe", "piping", "pipeline", "tube", "tubing"],
  valves: [
    "valve",
    "valves",
    "ball valve",
    "gate valve",
    "check valve",
    "control valve",
  ],
  flanges: ["flange", "flanges", "weld neck", "slip on", "blind flange"],
  fittings: ["fitting", "fittings", "elbow", "tee", "reducer", "coupling"],
  bolts: ["bolt", "bolts", "stud", "fastener", "fasteners", "screw"],
  gaskets: ["gasket", "gaskets", "sealing", "seal", "o-ring"],
  finned_tubes: [
    "finned tube",
    "finned tubes",
    "fin tube",
    "heat exchanger tube",
  ],
});

/* ---------------- Months ---------------- */

export const MONTHS: Readonly<Record<string, number>> = Object.freeze({
  january: 1,
  jan: 1,
  february: 2,
  feb: 2,
  march: 3,
  mar: 3,
  april: 4,
  apr: 4,
  may: 5,
  june: 6,
  jun: 6,
  july: 7,
  jul: 7,
  august: 8,
  aug: 8,
  september: 9,
  sep: 9,
  sept: 9,
  october: 10,
  oct: 10,
  november: 11,
  nov: 11,
  december: 12,
  dec: 12,
});

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export function monthNumber(name: string): number | null {
  const key = name.toLowerCase().replace(/\.$/, "");
  return Object.hasOwn(MONTHS, key) ? MONTHS[key] : null;
}

// longest first so "sept" wins over "sep" and "june" over "jun"
const MONTH_ALT = Object.keys(MONTHS)
  .sort((a, b) => b.length - a.length)
  .join("|");

/* ---------------- Date grammars ---------------- */

/** Which capture group carries which field. */
export type FieldOrder = "dmy" | "ymd" | "mdy";

export type DateGrammar = {
  name: string;
  pattern: RegExp;
  order: FieldOrder;
};

const NUM_SEP = "[\\/.-]";
const ORD = "(?:st|nd|rd|th)";

const grammar = (
  name: string,
  source: string,
  order: FieldOrder
): DateGrammar =>
  Object.freeze({ name, pattern: new RegExp(source, "gi"), order });

/** Scan order matters: the first grammar that yields a valid date wins. */
export const DATE_GRAMMARS: readonly DateGrammar[] = Object.freeze([
  grammar(
    "dmy",
    `(?<!\\d)(\\d{1,2})${NUM_SEP}(\\d{1,2})${NUM_SEP}(\\d{4})(?!\\d)`,
    "dmy"
  ),
  grammar(
    "dmy_short",
    `(?<!\\d)(\\d{1,2})${NUM_SEP}(\\d{1,2})${NUM_SEP}(\\d{2})(?!\\d)`,
    "dmy"
  ),
  grammar(
    "ymd",
    `(?<!\\d)(\\d{4})${NUM_SEP}(\\d{1,2})${NUM_SEP}(\\d{1,2})(?!\\d)`,
    "ymd"
  ),
  grammar(
    "month_day_year",
    `\\b(${MONTH_ALT})\\b\\.?\\s+(\\d{1,2}),?\\s+(\\d{4})(?!\\d)`,
    "mdy"
  ),
  grammar(
    "day_month_year",
    `(?<!\\d)(\\d{1,2})\\s+(${MONTH_ALT})\\b\\.?,?\\s+(\\d{4})(?!\\d)`,
    "dmy"
  ),
  grammar(
    "month_day_year_ord",
    `\\b(${MONTH_ALT})\\b\\.?\\s+(\\d{1,2})${ORD},?\\s+(\\d{4})(?!\\d)`,
    "mdy"
  ),
  grammar(
    "day_month_year_ord",
    `(?<!\\d)(\\d{1,2})${ORD}\\s+(?:of\\s+)?(${MONTH_ALT})\\b\\.?,?\\s+(\\d{4})(?!\\d)`,
    "dmy"
  ),
]);

/* ---------------- Deadline context ---------------- */

/** Priority order: earlier phrases are tried first across the whole text. */
export const DEADLINE_CONTEXTS: readonly RegExp[] = Object.freeze([
  /\bdeadline\s*:?\s*/gi,
  /\bdue\s*(?:by|on|date)?\s*:?\s*/gi,
  /\bsubmit\s*(?:by|before|on)?\s*:?\s*/gi,
  /\bclosing\s*(?:date|time)?\s*:?\s*/gi,
  /\bno\s*later\s*than\s*:?\s*/gi,
  /\bfinal\s*(?:date|deadline)\s*:?\s*/gi,
  /\btender\s*(?:deadline|due)\s*:?\s*/gi,
  /\bproposal\s*(?:deadline|due)\s*:?\s*/gi,
  /\bquotation\s*(?:deadline|due)\s*:?\s*/gi,
]);

export const CONTEXT_WINDOW = Object.freeze({ before: 50, after: 100 });

/* ---------------- Specifications ---------------- */

export const SPEC_CUE_KEYWORDS: readonly string[] = Object.freeze([
  "specification",
  "spec",
  "requirement",
  "standard",
  "grade",
  "material",
  "size",
  "pressure",
  "temperature",
  "class",
  "rating",
]);

// short standards-body codes; substring matching would hit ordinary words
export const SPEC_STANDARD_CODES = /\b(?:api|astm|asme|din|en|iso)\b/;

export const TECHNICAL_PATTERNS: readonly RegExp[] = Object.freeze([
  /\d+["']\s*(?:diameter|dia|pipe|tube)/,
  /\b(?:grade|class|schedule|rating)\s*[a-z0-9]+/,
  /\b(?:api|ansi|astm|asme|iso)\s*[0-9a-z-]+/,
  /\d+\s*(?:mm|cm|inch(?:es)?|in)\b|\d+\s*["']/,
  /\b(?:carbon|stainless|alloy)\s*steel/,
  /\b(?:ball|gate|check|globe)\s*valve/,
]);

export const MIN_SPEC_LENGTH = 5;

/* ---------------- Project identifiers ---------------- */

// applied to lowercased text
export const PROJECT_NAME_PATTERNS: readonly RegExp[] = Object.freeze([
  /\bproject\s*:\s*([^\n]+)/,
  /\bproject\s+name\s*:?\s*([^\n]+)/,
  /\btitle\s*:\s*([^\n]+)/,
  /\bname\s*:\s*([^\n]+)/,
]);

export const PROJECT_NAME_LENGTH = Object.freeze({ min: 3, max: 100 });

const REF_CODE = "([A-Z0-9][A-Z0-9\\/-]*)";

export const TENDER_REFERENCE_PATTERNS: readonly RegExp[] = Object.freeze([
  new RegExp(
    `\\b(?:tender|ref|reference)\\s*(?:no\\b\\.?|number|#)\\s*:?\\s*${REF_CODE}`,
    "i"
  ),
  /\b((?:rfq|rfp)-[A-Z0-9][A-Z0-9/-]*)/i,
  new RegExp(`\\b(?:rfq|rfp)\\s*(?:no\\b\\.?|#)?\\s*:?\\s*${REF_CODE}`, "i"),
  new RegExp(`\\btender\\s*:\\s*${REF_CODE}`, "i"),
  new RegExp(`\\bref\\b\\.?\\s*:?\\s*${REF_CODE}`, "i"),
]);

export const MIN_REFERENCE_LENGTH = 2;
