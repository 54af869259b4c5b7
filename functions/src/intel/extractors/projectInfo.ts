import {
  MIN_REFERENCE_LENGTH,
  PROJECT_NAME_LENGTH,
  PROJECT_NAME_PATTERNS,
  TENDER_REFERENCE_PATTERNS,
} from "../patterns";

export type ProjectInfo = {
  projectName: string | null;
  tenderReference: string | null;
};

export function toTitleCase(s: string): string {
  return s.replace(
    /[a-z]+/gi,
    (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase()
  );
}

/** First capture, by label priority, that passes `accept`. */
function firstLabelled(
  text: string,
  patterns: readonly RegExp[],
  accept: (value: string) => boolean
): string | null {
  for (const p of patterns) {
    const value = p.exec(text)?.[1]?.trim();
    if (value && accept(value)) return value;
  }
  return null;
}

function extractProjectName(text: string): string | null {
  const { min, max } = PROJECT_NAME_LENGTH;
  const name = firstLabelled(
    text.toLowerCase(),
    PROJECT_NAME_PATTERNS,
    (v) => v.length > min && v.length < max
  );
  return name ? toTitleCase(name) : null;
}

function extractTenderReference(text: string): string | null {
  const ref = firstLabelled(
    text,
    TENDER_REFERENCE_PATTERNS,
    (v) => v.length > MIN_REFERENCE_LENGTH
  );
  return ref ? ref.toUpperCase() : null;
}

/** Labelled project name and tender reference. Both are hints only. */
export function extractProjectInfo(text: string): ProjectInfo {
  return {
    projectName: extractProjectName(text),
    tenderReference: extractTenderReference(text),
  };
}
