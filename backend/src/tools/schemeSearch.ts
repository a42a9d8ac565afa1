import { z } from 'zod';
import type { SchemeDocument, ToolDefinition } from '../../../shared/types.js';
import { distanceToScore } from '../retrieval/merge.js';
import type { SchemeRetriever } from '../retrieval/retriever.js';
import type { DocumentStore } from '../retrieval/types.js';

export const SCHEME_TOOL_NAME = 'search_government_schemes' as const;

export const schemeSearchDefinition = {
  name: SCHEME_TOOL_NAME,
  description:
    'Searches Indian central and state government schemes for farmers: income support, crop insurance, ' +
    'credit, irrigation subsidies, organic farming, machinery and soil health. ' +
    'Returns the best matching schemes with eligibility, benefits, how to apply and contact details. ' +
    'If the farmer wants state-specific help and has not said which state they farm in, ask first.',
  parameters: {
    query: {
      type: 'string',
      description: "What the farmer needs, in their words, e.g. 'loan for buying a tractor in Karnataka'.",
      required: true
    },
    top_k: {
      type: 'integer',
      description: 'Number of schemes to return (default 2).',
      required: false
    }
  }
} satisfies ToolDefinition;

export const schemeSearchArgs = z
  .object({
    query: z.string(),
    top_k: z.number().int().optional()
  })
  .strict();

export type SchemeSearchArgs = z.infer<typeof schemeSearchArgs>;

export interface SchemeMatch extends SchemeDocument {
  rank: number;
  distance: number;
  score: number;
}

export interface SchemeSearchResult {
  query: string;
  expandedQueries: string[];
  schemes: SchemeMatch[];
  message: string;
}

/**
 * Scheme retrieval exposed as a tool. Retrieval failures propagate; this tool
 * does not wrap them in a result payload.
 */
export class SchemeSearchTool {
  constructor(
    private readonly retriever: SchemeRetriever,
    private readonly documents: DocumentStore,
    private readonly defaultTopK: number
  ) {}

  async search(args: SchemeSearchArgs): Promise<SchemeSearchResult> {
    const { queries, results } = await this.retriever.retrieve(args.query, args.top_k ?? this.defaultTopK);

    const schemes: SchemeMatch[] = [];
    for (const result of results) {
      const document = await this.documents.getDocument(result.documentId);
      if (!document) {
        throw new Error(`Scheme ${result.documentId} is indexed but has no stored document`);
      }
      schemes.push({
        ...document,
        rank: result.rank,
        distance: result.distance,
        score: distanceToScore(result.distance)
      });
    }

    return {
      query: args.query,
      expandedQueries: queries,
      schemes,
      message: schemes.length
        ? `Found ${schemes.length} relevant scheme(s): ${schemes.map((scheme) => scheme.title).join('; ')}.`
        : 'No matching government schemes were found.'
    };
  }
}
