import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SchemeDocument } from '../../../shared/types.js';

export const schemeDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  category: z.string(),
  eligibility: z.array(z.string()),
  benefits: z.array(z.string()),
  applicationProcess: z.string(),
  requiredDocuments: z.array(z.string()),
  contactInfo: z.string(),
  website: z.string(),
  state: z.string().nullable().optional()
}) satisfies z.ZodType<SchemeDocument>;

const schemeListSchema = z.array(schemeDocumentSchema).superRefine((schemes, ctx) => {
  const seen = new Set<string>();
  schemes.forEach((scheme, index) => {
    if (seen.has(scheme.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `duplicate scheme id ${scheme.id}` });
    }
    seen.add(scheme.id);
  });
});

export function parseSchemes(raw: unknown): SchemeDocument[] {
  return schemeListSchema.parse(raw);
}

export async function loadSchemes(path: string): Promise<SchemeDocument[]> {
  const contents = await readFile(path, 'utf8');
  const raw: unknown = JSON.parse(contents);
  return parseSchemes(raw);
}

/** Text embedded for a scheme; queries are matched against this. */
export function schemeSearchText(scheme: SchemeDocument): string {
  return [
    `Title: ${scheme.title}`,
    `Description: ${scheme.description}`,
    `Category: ${scheme.category}`,
    `Eligibility: ${scheme.eligibility.join(', ')}`,
    `Benefits: ${scheme.benefits.join(', ')}`,
    `Application Process: ${scheme.applicationProcess}`,
    `State: ${scheme.state ?? 'All India'}`
  ].join('\n');
}
