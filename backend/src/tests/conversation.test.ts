import { describe, expect, it, vi } from 'vitest';
import type { ChatMessage } from '../../../shared/types.js';
import { ConversationState, validateConversation } from '../orchestrator/conversation.js';
import { ThoughtLog } from '../orchestrator/thoughtLog.js';

const calls = [
  { id: 'call_1', toolName: 'get_commodity_price', arguments: { commodity: 'Onion' } },
  { id: 'call_2', toolName: 'search_government_schemes', arguments: { query: 'storage subsidy' } }
];

describe('ConversationState', () => {
  it('starts with exactly one system message', () => {
    const conversation = ConversationState.create('be helpful');
    expect(conversation.snapshot()).toEqual([{ role: 'system', content: 'be helpful' }]);
  });

  it('keeps tool results paired with the preceding batch', () => {
    const conversation = ConversationState.create('sys');
    conversation.appendUser('onion price?');
    conversation.appendToolCalls(calls);
    conversation.appendToolResult('call_1', '{"ok":true}');
    conversation.appendToolResult('call_2', '{"ok":true}');
    conversation.appendAssistantText('Onions sell for ₹20/kg.');

    expect(validateConversation(conversation.view())).toEqual([]);
    expect(conversation.length).toBe(6);
  });

  it('returns snapshots that do not alias internal state', () => {
    const conversation = ConversationState.create('sys');
    conversation.appendToolCalls(calls);

    const snapshot = conversation.snapshot();
    const toolCallMessage = snapshot[1];
    if (toolCallMessage.role !== 'assistant' || toolCallMessage.content !== null) {
      throw new Error('expected a tool-call message');
    }
    toolCallMessage.toolCalls.pop();

    expect(conversation.snapshot()[1]).toMatchObject({ toolCalls: calls });
  });

  it('truncates back to a checkpoint but never drops the system message', () => {
    const conversation = ConversationState.create('sys');
    const checkpoint = conversation.length;
    conversation.appendUser('hello');
    conversation.appendToolCalls(calls);

    conversation.truncate(checkpoint);
    expect(conversation.snapshot()).toEqual([{ role: 'system', content: 'sys' }]);
    expect(() => conversation.truncate(0)).toThrow('The system message cannot be removed');
  });

  it('reset is idempotent', () => {
    const conversation = ConversationState.create('sys');
    conversation.appendUser('hello');
    conversation.reset();
    conversation.reset();
    expect(conversation.snapshot()).toEqual([{ role: 'system', content: 'sys' }]);
  });

  it('restores a valid transcript and rejects a broken one', () => {
    const transcript: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Namaste!' }
    ];
    expect(ConversationState.restore(transcript).snapshot()).toEqual(transcript);
    expect(() => ConversationState.restore([{ role: 'user', content: 'hi' }])).toThrow(/Invalid conversation transcript/);
  });
});

describe('validateConversation', () => {
  it('flags tool results that are out of order or unanswered', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      { role: 'assistant', content: null, toolCalls: calls },
      { role: 'tool', toolCallId: 'call_2', content: '{}' },
      { role: 'assistant', content: 'done' }
    ];

    expect(validateConversation(messages)).toEqual([
      'tool message at index 3 answers call_2, expected call_1',
      'tool-call batch before index 4 has 1 unanswered request(s)'
    ]);
  });

  it('flags stray tool messages and extra system messages', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'system', content: 'again' },
      { role: 'tool', toolCallId: 'call_9', content: '{}' }
    ];

    expect(validateConversation(messages)).toEqual([
      'unexpected system message at index 1',
      'tool message at index 2 does not answer a pending tool call'
    ]);
  });

  it('flags a batch left unanswered at the end', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'assistant', content: null, toolCalls: calls },
      { role: 'tool', toolCallId: 'call_1', content: '{}' }
    ];

    expect(validateConversation(messages)).toEqual(['final tool-call batch has 1 unanswered request(s)']);
  });
});

describe('ThoughtLog', () => {
  it('records frozen thoughts with timestamps and forwards them to the sink', () => {
    const sink = vi.fn();
    const log = new ThoughtLog(sink, () => new Date('2026-01-15T08:30:00.000Z'));

    const thought = log.record('DECIDING', { reasoning: 'why', action: 'what', details: { tools: 3 } });

    expect(thought).toEqual({
      timestamp: '2026-01-15T08:30:00.000Z',
      step: 'DECIDING',
      reasoning: 'why',
      action: 'what',
      details: { tools: 3 }
    });
    expect(Object.isFrozen(thought)).toBe(true);
    expect(sink).toHaveBeenCalledWith(thought);
  });

  it('hands out copies and clears only on request', () => {
    const log = new ThoughtLog();
    log.record('AWAIT_INPUT', { reasoning: 'r', action: 'a' });

    const listed = log.list();
    listed.pop();
    expect(log.size).toBe(1);

    log.clear();
    expect(log.list()).toEqual([]);
  });

  it('restores persisted thoughts only into an empty log', () => {
    const log = new ThoughtLog();
    const stored = [{ timestamp: '2026-01-15T08:30:00.000Z', step: 'DONE', reasoning: 'r', action: 'a' }];

    log.restore(stored);
    expect(log.list()).toEqual(stored);
    expect(() => log.restore(stored)).toThrow('Cannot restore into a thought log that already has entries');
  });
});
