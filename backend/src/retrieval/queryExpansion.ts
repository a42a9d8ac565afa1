import type { ChatCompletionClient } from '../openai/openaiClient.js';
import type { QueryExpander } from './types.js';

const MAX_EXPANSIONS = 3;

const EXPANSION_PROMPT = `You help farmers find Indian government agricultural schemes.
Rewrite the farmer's question into 2-3 short, focused search queries that would match scheme descriptions.
Cover the likely scheme category (subsidy, insurance, credit, irrigation, organic farming, machinery) and any state mentioned.
Return one query per line with no numbering or commentary.`;

/**
 * Splits a model reply into search queries: one per line, bullets, numbering
 * and surrounding quotes removed, at most three kept.
 */
export function parseExpansions(reply: string): string[] {
  return reply
    .split('\n')
    .map((line) =>
      line
        .trim()
        .replace(/^(?:[-*•]\s*|\d+[.)]\s*)/, '')
        .replace(/^["'`]+|["'`]+$/g, '')
        .trim()
    )
    .filter((line) => line.length > 0)
    .slice(0, MAX_EXPANSIONS);
}

export interface QueryExpansionOptions {
  model: string;
  temperature: number;
}

export class OpenAIQueryExpander implements QueryExpander {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: QueryExpansionOptions
  ) {}

  async expand(query: string): Promise<string[]> {
    const reply = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: this.options.temperature,
      messages: [
        { role: 'system', content: EXPANSION_PROMPT },
        { role: 'user', content: query }
      ]
    });
    return parseExpansions(reply.choices[0]?.message.content ?? '');
  }
}

/**
 * Expansion is best effort: a failed or empty expansion searches with the
 * original query alone.
 */
export async function expandWithFallback(expander: QueryExpander, query: string): Promise<string[]> {
  try {
    const queries = await expander.expand(query);
    if (queries.length > 0) {
      return queries;
    }
    console.warn('Query expansion returned no queries; searching with the original query.');
  } catch (error) {
    console.warn('Query expansion failed; searching with the original query.', error);
  }
  return [query];
}
