import { todayISO, type CalendarDate } from "./dates";
import type { MaterialCategory } from "./patterns";
import { extractDeadline } from "./extractors/deadline";
import { extractMaterials } from "./extractors/materials";
import { extractProjectInfo } from "./extractors/projectInfo";
import { extractSpecifications } from "./extractors/specifications";

export type ExtractedDocument = Readonly<{
  rawText: string;
  materials: readonly MaterialCategory[];
  deadline: CalendarDate | null;
  specifications: readonly string[];
  projectName: string | null;
  tenderReference: string | null;
  // set only when the upstream decoder failed to produce text
  error?: string;
}>;

export type AnalyzeOptions = {
  /** Reference date for the future-only fallback scan. */
  today?: CalendarDate;
};

/** File types the upstream decoder knows how to turn into text. */
export const SUPPORTED_EXTENSIONS = [
  "pdf",
  "docx",
  "doc",
  "xlsx",
  "xls",
  "txt",
] as const;

function freeze(doc: ExtractedDocument): ExtractedDocument {
  Object.freeze(doc.materials);
  Object.freeze(doc.specifications);
  return Object.freeze(doc);
}

/**
 * Runs every extractor over the same text and merges the results. Each
 * extractor is independent; a miss is an empty field, never an exception.
 */
export function analyzeDocument(
  rawText: string,
  { today = todayISO() }: AnalyzeOptions = {}
): ExtractedDocument {
  const { projectName, tenderReference } = extractProjectInfo(rawText);
  return freeze({
    rawText,
    materials: extractMaterials(rawText),
    deadline: extractDeadline(rawText, today),
    specifications: extractSpecifications(rawText),
    projectName,
    tenderReference,
  });
}

export function failedDocument(
  rawText: string,
  error: string
): ExtractedDocument {
  return freeze({
    rawText,
    materials: [],
    deadline: null,
    specifications: [],
    projectName: null,
    tenderReference: null,
    error,
  });
}

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : "";
}

/** Analysis of text decoded from `fileName`, refusing unknown file types. */
export function documentForFile(
  fileName: string,
  text: string,
  options: AnalyzeOptions = {}
): ExtractedDocument {
  const ext = fileExtension(fileName);
  const supported: readonly string[] = SUPPORTED_EXTENSIONS;
  if (!supported.includes(ext)) {
    return failedDocument("", `Unsupported file format: ${ext}`);
  }
  return analyzeDocument(text, options);
}
