import type {
  AssistantToolCallMessage,
  ChatMessage,
  ToolCallRequest,
  ToolResultMessage
} from '../../../shared/types.js';

/**
 * Checks the structural invariants of a conversation and returns the
 * violations found (empty when valid):
 * - exactly one system message, at index 0
 * - tool messages follow an assistant tool-call message and answer its
 *   requests in request order, one each
 * - a tool-call batch is fully answered before any other message
 */
export function validateConversation(messages: readonly ChatMessage[]): string[] {
  const problems: string[] = [];

  if (messages[0]?.role !== 'system') {
    problems.push('conversation must start with a system message');
  }
  messages.forEach((message, index) => {
    if (index > 0 && message.role === 'system') {
      problems.push(`unexpected system message at index ${index}`);
    }
  });

  let batch: ToolCallRequest[] | null = null;
  let answered = 0;

  for (const [index, message] of messages.entries()) {
    if (message.role === 'tool') {
      const expected = batch?.[answered];
      if (!expected) {
        problems.push(`tool message at index ${index} does not answer a pending tool call`);
      } else if (expected.id !== message.toolCallId) {
        problems.push(`tool message at index ${index} answers ${message.toolCallId}, expected ${expected.id}`);
      }
      answered += 1;
      continue;
    }

    if (batch && answered < batch.length) {
      problems.push(`tool-call batch before index ${index} has ${batch.length - answered} unanswered request(s)`);
    }
    batch = message.role === 'assistant' && message.content === null ? message.toolCalls : null;
    answered = 0;
  }

  if (batch && answered < batch.length) {
    problems.push(`final tool-call batch has ${batch.length - answered} unanswered request(s)`);
  }

  return problems;
}

/**
 * One session's message history. The first message is always the system
 * prompt; everything else is appended by the orchestration loop.
 */
export class ConversationState {
  private messages: ChatMessage[];

  private constructor(private readonly systemPrompt: string) {
    this.messages = [{ role: 'system', content: systemPrompt }];
  }

  static create(systemPrompt: string): ConversationState {
    return new ConversationState(systemPrompt);
  }

  /** Rebuilds a conversation from a stored transcript; rejects transcripts that break the invariants. */
  static restore(messages: readonly ChatMessage[]): ConversationState {
    const problems = validateConversation(messages);
    const first = messages[0];
    if (problems.length || first?.role !== 'system') {
      throw new Error(`Invalid conversation transcript: ${problems.join('; ')}`);
    }
    const state = new ConversationState(first.content);
    state.messages = messages.map((message) => ({ ...message }));
    return state;
  }

  appendUser(content: string): void {
    this.messages.push({ role: 'user', content });
  }

  appendAssistantText(content: string): void {
    this.messages.push({ role: 'assistant', content });
  }

  appendToolCalls(calls: readonly ToolCallRequest[]): AssistantToolCallMessage {
    const message: AssistantToolCallMessage = {
      role: 'assistant',
      content: null,
      toolCalls: calls.map((call) => ({ ...call, arguments: { ...call.arguments } }))
    };
    this.messages.push(message);
    return message;
  }

  appendToolResult(toolCallId: string, content: string): ToolResultMessage {
    const message: ToolResultMessage = { role: 'tool', toolCallId, content };
    this.messages.push(message);
    return message;
  }

  /** Drops every message from `length` onwards; used to roll back a failed turn. */
  truncate(length: number): void {
    if (length < 1) {
      throw new Error('The system message cannot be removed');
    }
    this.messages.length = Math.min(length, this.messages.length);
  }

  reset(): void {
    this.messages = [{ role: 'system', content: this.systemPrompt }];
  }

  get length(): number {
    return this.messages.length;
  }

  snapshot(): ChatMessage[] {
    return this.messages.map((message) =>
      message.role === 'assistant' && message.content === null
        ? { ...message, toolCalls: message.toolCalls.map((call) => ({ ...call })) }
        : { ...message }
    );
  }

  view(): readonly ChatMessage[] {
    return this.messages;
  }
}
