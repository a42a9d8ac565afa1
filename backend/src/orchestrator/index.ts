import type { AgentThought, ChatMessage, ToolCallRequest } from '../../../shared/types.js';
import type { CapabilityRegistry } from '../tools/registry.js';
import { InvalidArgumentError, describeError, isAgentError } from '../utils/errors.js';
import { ConversationState } from './conversation.js';
import { SYSTEM_PROMPT, formatUserMessage } from './prompts.js';
import { traced } from './telemetry.js';
import { ThoughtLog, type ThoughtSink } from './thoughtLog.js';
import type { DecisionService, TurnOptions } from './types.js';

export interface FarmAgentOptions {
  decisionService: DecisionService;
  registry: CapabilityRegistry;
  systemPrompt?: string;
  thoughtSink?: ThoughtSink;
  /** Previously persisted state to resume from. */
  transcript?: { messages: readonly ChatMessage[]; thoughts: readonly AgentThought[] };
}

function serializeToolResult(result: unknown): string {
  return JSON.stringify(result ?? null);
}

function summarizeCalls(calls: readonly ToolCallRequest[]) {
  return calls.map((call) => ({ id: call.id, tool: call.toolName, arguments: call.arguments }));
}

/**
 * Drives one conversation: each turn goes
 * AWAIT_INPUT → DECIDING → (DIRECT_ANSWER | DISPATCHING → SYNTHESIZING) → DONE.
 *
 * A failed turn is rolled back to the conversation as it was before the
 * farmer's message and the error is rethrown (fail-fast: a failing tool aborts
 * the rest of its batch and no answer is synthesized from partial results).
 * Turns on one agent must not overlap.
 */
export class FarmAgent {
  private readonly conversation: ConversationState;
  private readonly thoughts: ThoughtLog;
  private readonly decisionService: DecisionService;
  private readonly registry: CapabilityRegistry;
  private turnInProgress = false;

  constructor(options: FarmAgentOptions) {
    this.decisionService = options.decisionService;
    this.registry = options.registry;
    this.thoughts = new ThoughtLog(options.thoughtSink);

    if (options.transcript) {
      this.conversation = ConversationState.restore(options.transcript.messages);
      this.thoughts.restore(options.transcript.thoughts);
    } else {
      this.conversation = ConversationState.create(options.systemPrompt ?? SYSTEM_PROMPT);
    }
  }

  async runTurn(message: string, options: TurnOptions = {}): Promise<string> {
    if (!message.trim()) {
      throw new InvalidArgumentError('message must not be empty');
    }
    if (this.turnInProgress) {
      throw new Error('A turn is already in progress for this conversation');
    }

    this.turnInProgress = true;
    const checkpoint = this.conversation.length;
    try {
      return await traced('agent.turn', () => this.executeTurn(message, options), {
        'agent.has_image': Boolean(options.imagePath)
      });
    } catch (error) {
      this.conversation.truncate(checkpoint);
      this.thoughts.record('FAILED', {
        reasoning: 'The turn failed; the conversation was rolled back to before this message',
        action: 'Propagating error',
        details: {
          error: isAgentError(error) ? error.code : error instanceof Error ? error.name : 'unknown',
          message: describeError(error)
        }
      });
      throw error;
    } finally {
      this.turnInProgress = false;
    }
  }

  private async executeTurn(message: string, options: TurnOptions): Promise<string> {
    this.conversation.appendUser(formatUserMessage(message, options.imagePath));
    this.thoughts.record('AWAIT_INPUT', {
      reasoning: 'Received a message from the farmer',
      action: 'Added the message to the conversation',
      details: { characters: message.length, imagePath: options.imagePath ?? null }
    });

    const tools = this.registry.listDefinitions();
    this.thoughts.record('DECIDING', {
      reasoning: 'Deciding whether the question needs tools or can be answered directly',
      action: 'Requesting a decision from the language model',
      details: { availableTools: tools.map((tool) => tool.name) }
    });
    const decision = await this.decisionService.decide(this.conversation.view(), tools);

    if (decision.kind === 'text') {
      this.conversation.appendAssistantText(decision.content);
      this.thoughts.record('DIRECT_ANSWER', {
        reasoning: 'No tools were needed',
        action: 'Answering directly'
      });
      this.recordDone(0);
      return decision.content;
    }

    const { calls } = decision;
    this.conversation.appendToolCalls(calls);
    this.thoughts.record('DISPATCHING', {
      reasoning: `The model requested ${calls.length} tool call(s)`,
      action: 'Executing tool calls in order',
      details: {
        calls: summarizeCalls(calls),
        ...(decision.ignoredText ? { ignoredText: decision.ignoredText } : {})
      }
    });

    for (const [index, call] of calls.entries()) {
      this.thoughts.record('DISPATCHING', {
        reasoning: `Tool call ${index + 1} of ${calls.length}`,
        action: `Calling ${call.toolName}`,
        details: { id: call.id, tool: call.toolName, arguments: call.arguments }
      });
      const result = await this.registry.dispatch(call.toolName, call.arguments);
      this.conversation.appendToolResult(call.id, serializeToolResult(result));
    }

    this.thoughts.record('SYNTHESIZING', {
      reasoning: 'All tool results are in',
      action: 'Generating the final answer from the tool results',
      details: { toolResults: calls.length }
    });
    const answer = await this.decisionService.generate(this.conversation.view());
    this.conversation.appendAssistantText(answer);

    this.recordDone(calls.length);
    return answer;
  }

  private recordDone(toolCalls: number) {
    this.thoughts.record('DONE', {
      reasoning: 'The turn is complete',
      action: 'Returning the answer',
      details: { toolCalls }
    });
  }

  /** Back to just the system prompt, with an empty thought log. */
  reset(): void {
    if (this.turnInProgress) {
      throw new Error('Cannot reset while a turn is in progress');
    }
    this.conversation.reset();
    this.thoughts.clear();
  }

  getConversation(): ChatMessage[] {
    return this.conversation.snapshot();
  }

  getThoughts(): Readonly<AgentThought>[] {
    return this.thoughts.list();
  }
}

export { ConversationState, validateConversation } from './conversation.js';
export { ThoughtLog } from './thoughtLog.js';
export type { Decision, DecisionService, TurnOptions, TurnState } from './types.js';
