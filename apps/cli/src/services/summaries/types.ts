import { z } from 'zod';

export const TARGET_LANGUAGES = ['zh', 'en'] as const;
export type TargetLanguage = (typeof TARGET_LANGUAGES)[number];

/**
 * Persisted summary, one JSON file per paper
 */
export interface PaperSummary {
  /** Source PDF file name without extension */
  id: string;
  title: string;
  summary: string;
  phenomenon: string[];
  problem: string[];
  mechanism: string[];
  result: string[];
}

export type SummaryContent = Omit<PaperSummary, 'id' | 'title'> & { title?: string };

export interface TextExtractor {
  extract(pdfPath: string): Promise<string>;
}

export interface Summarizer {
  summarize(text: string): Promise<SummaryContent>;
}

export interface Translator {
  translate(text: string, targetLang: TargetLanguage): Promise<string>;
}

const LIST_MARKER = /^\s*(?:[-*•]\s+|\(\d+\)\s*|\d+[.)]\s+|\d+、)/;

function toSectionItems(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (typeof value === 'object') {
    items = Object.values(value);
  } else {
    items = String(value).split(/\r?\n/);
  }
  return items
    .map((item) => (typeof item === 'string' || typeof item === 'number' ? String(item) : JSON.stringify(item)))
    .map((item) => item.replace(LIST_MARKER, '').trim())
    .filter(Boolean);
}

// Models answer with a string, a list or a numbered object per section
const sectionSchema = z.unknown().transform(toSectionItems);

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

// JSON mode sometimes answers null or a number for a text field
const optionalText = z.unknown().transform(toText);
const textField = z.unknown().transform((value) => toText(value) ?? '');

export const summaryContentSchema = z.object({
  title: optionalText,
  summary: optionalText,
  phenomenon: sectionSchema,
  problem: sectionSchema,
  mechanism: sectionSchema,
  result: sectionSchema,
});

export const paperSummarySchema = z.object({
  id: z.string().optional(),
  title: textField,
  summary: textField,
  phenomenon: sectionSchema,
  problem: sectionSchema,
  mechanism: sectionSchema,
  result: sectionSchema,
});
