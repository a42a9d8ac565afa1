import type { ChatMessage, ToolCallRequest, ToolDefinition } from '../../../shared/types.js';

export type TurnState =
  | 'AWAIT_INPUT'
  | 'DECIDING'
  | 'DIRECT_ANSWER'
  | 'DISPATCHING'
  | 'SYNTHESIZING'
  | 'DONE'
  | 'FAILED';

export type Decision =
  | { kind: 'text'; content: string }
  | {
      kind: 'tool_calls';
      calls: ToolCallRequest[];
      /** Text the model sent alongside its tool calls; tool calls take precedence. */
      ignoredText?: string;
    };

export interface DecisionService {
  decide(conversation: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<Decision>;
  generate(conversation: readonly ChatMessage[]): Promise<string>;
}

export interface TurnOptions {
  imagePath?: string;
}
