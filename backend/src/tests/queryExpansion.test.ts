import { afterEach, describe, expect, it, vi } from 'vitest';
import { OpenAIQueryExpander, expandWithFallback, parseExpansions } from '../retrieval/queryExpansion.js';
import { StaticExpander, completion, fakeChatClient } from './fakes.js';

describe('parseExpansions', () => {
  it('strips bullets, numbering and quotes and drops blank lines', () => {
    const reply = ['1. "PM-KISAN income support"', '', '- crop insurance Karnataka', '* `drip irrigation subsidy`'].join('\n');

    expect(parseExpansions(reply)).toEqual([
      'PM-KISAN income support',
      'crop insurance Karnataka',
      'drip irrigation subsidy'
    ]);
  });

  it('keeps at most three queries', () => {
    expect(parseExpansions('a\nb\nc\nd\ne')).toEqual(['a', 'b', 'c']);
  });

  it('returns nothing for an empty reply', () => {
    expect(parseExpansions('  \n\n')).toEqual([]);
  });
});

describe('OpenAIQueryExpander', () => {
  it('sends the farmer question with the expansion prompt', async () => {
    const { client, create } = fakeChatClient(completion({ content: 'tractor loan\nfarm machinery subsidy' }));
    const expander = new OpenAIQueryExpander(client, { model: 'expander-model', temperature: 0.3 });

    await expect(expander.expand('loan for a tractor')).resolves.toEqual(['tractor loan', 'farm machinery subsidy']);

    const [body] = create.mock.calls[0];
    expect(body.model).toBe('expander-model');
    expect(body.temperature).toBe(0.3);
    expect(body.messages[0].role).toBe('system');
    expect(body.messages[1]).toEqual({ role: 'user', content: 'loan for a tractor' });
  });

  it('yields no queries when the model returns no content', async () => {
    const { client } = fakeChatClient(completion({ content: null }));
    const expander = new OpenAIQueryExpander(client, { model: 'expander-model', temperature: 0.3 });

    await expect(expander.expand('anything')).resolves.toEqual([]);
  });
});

describe('expandWithFallback', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes expansions through', async () => {
    await expect(expandWithFallback(new StaticExpander(['a', 'b']), 'q')).resolves.toEqual(['a', 'b']);
  });

  it('falls back to the original query and warns when expansion throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const failure = new Error('rate limited');

    await expect(expandWithFallback(new StaticExpander(failure), 'solar pump subsidy')).resolves.toEqual([
      'solar pump subsidy'
    ]);
    expect(warn).toHaveBeenCalledWith('Query expansion failed; searching with the original query.', failure);
  });
});
