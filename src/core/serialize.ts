import { z } from 'zod';
import type { NormalizedDocument, RiskSection } from './types.js';

const FilingIdSchema = z.object({
  company: z.string(),
  cik: z.string(),
  fiscalYear: z.number().int(),
  filingDate: z.string(),
  accessionNumber: z.string().optional(),
});

const SpanSchema = z.object({ start: z.number().int().min(0), end: z.number().int().min(0) });

const NormalizedDocumentSchema = z
  .object({
    id: FilingIdSchema,
    text: z.string(),
    paragraphs: z.array(SpanSchema),
  })
  .refine((d) => d.paragraphs.every((p) => p.start <= p.end && p.end <= d.text.length), {
    message: 'paragraph span outside document text',
  });

const RiskSectionSchema = z
  .object({
    id: FilingIdSchema,
    fiscalYear: z.number().int(),
    start: z.number().int().min(0),
    end: z.number().int().min(0),
    text: z.string(),
    heading: z.string(),
    endHeading: z.string().nullable(),
    confidence: z.number().min(0).max(1),
  })
  .refine((s) => s.start < s.end && s.text.length === s.end - s.start, {
    message: 'section offsets do not match its text',
  });

export function serializeDocument(doc: NormalizedDocument): string {
  return JSON.stringify(doc);
}

export function serializeSection(section: RiskSection): string {
  return JSON.stringify(section);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: string): T | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Returns null for blobs that are not valid JSON or do not match the data model. */
export function parseDocument(json: string): NormalizedDocument | null {
  return parseWith(NormalizedDocumentSchema, json);
}

export function parseSection(json: string): RiskSection | null {
  return parseWith(RiskSectionSchema, json);
}
