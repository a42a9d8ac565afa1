import type { ChatMessage, ToolCallRequest, ToolDefinition } from '../../../shared/types.js';
import type { Decision, DecisionService } from '../orchestrator/types.js';
import { DecisionServiceError, describeError, isAgentError } from '../utils/errors.js';
import { parseToolArguments, toCompletionMessages, toCompletionTool } from '../utils/openai.js';
import type { ChatCompletionClient, ChatCompletionReply, ChatCompletionRequest } from './openaiClient.js';

export interface DecisionServiceOptions {
  model: string;
  temperature?: number;
}

/**
 * Chat Completions backed decision and synthesis. Failures surface as
 * DecisionServiceError; no retries happen here.
 */
export class OpenAIDecisionService implements DecisionService {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: DecisionServiceOptions
  ) {}

  async decide(conversation: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<Decision> {
    const request: ChatCompletionRequest = {
      model: this.options.model,
      messages: toCompletionMessages(conversation),
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {})
    };
    if (tools.length > 0) {
      request.tools = tools.map(toCompletionTool);
      request.tool_choice = 'auto';
    }

    const message = await this.complete(request);
    const text = message.content?.trim() ?? '';
    const toolCalls = message.tool_calls ?? [];

    if (toolCalls.length > 0) {
      const calls: ToolCallRequest[] = toolCalls.map((call) => ({
        id: call.id,
        toolName: call.function.name,
        arguments: parseToolArguments(call.function.name, call.function.arguments)
      }));
      return text ? { kind: 'tool_calls', calls, ignoredText: text } : { kind: 'tool_calls', calls };
    }

    if (!text) {
      throw new DecisionServiceError('Model returned neither text nor tool calls');
    }
    return { kind: 'text', content: text };
  }

  async generate(conversation: readonly ChatMessage[]): Promise<string> {
    const message = await this.complete({
      model: this.options.model,
      messages: toCompletionMessages(conversation),
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {})
    });

    const text = message.content?.trim();
    if (!text) {
      throw new DecisionServiceError('Model returned an empty answer');
    }
    return text;
  }

  private async complete(request: ChatCompletionRequest): Promise<ChatCompletionReply['choices'][number]['message']> {
    let reply: ChatCompletionReply;
    try {
      reply = await this.client.chat.completions.create(request);
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      throw new DecisionServiceError(`Chat completion failed: ${describeError(error)}`, error);
    }

    const choice = reply.choices[0];
    if (!choice) {
      throw new DecisionServiceError('Chat completion returned no choices');
    }
    return choice.message;
  }
}
