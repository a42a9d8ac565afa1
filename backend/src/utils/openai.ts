import type OpenAI from 'openai';
import type { ChatMessage, ToolArguments, ToolDefinition } from '../../../shared/types.js';
import { InvalidArgumentsError } from './errors.js';

type CompletionMessage = OpenAI.Chat.ChatCompletionMessageParam;
type CompletionTool = OpenAI.Chat.ChatCompletionTool;

export function toCompletionMessages(conversation: readonly ChatMessage[]): CompletionMessage[] {
  return conversation.map((message): CompletionMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
      case 'assistant':
        if (message.content === null) {
          return {
            role: 'assistant',
            content: null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.toolName, arguments: JSON.stringify(call.arguments) }
            }))
          };
        }
        return { role: 'assistant', content: message.content };
    }
  });
}

export function toCompletionTool(definition: ToolDefinition): CompletionTool {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(definition.parameters)) {
    properties[name] = {
      type: spec.type,
      description: spec.description,
      ...(spec.enum ? { enum: spec.enum } : {}),
      ...(spec.items ? { items: spec.items } : {})
    };
    if (spec.required) {
      required.push(name);
    }
  }

  return {
    type: 'function',
    function: {
      name: definition.name,
      description: definition.description,
      parameters: {
        type: 'object',
        properties,
        required
      }
    }
  };
}

function isPlainObject(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tool-call arguments arrive as a JSON string. Optional parameters the model
 * sends as null are dropped so they read as absent.
 */
export function parseToolArguments(toolName: string, raw: string): ToolArguments {
  if (!raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidArgumentsError(toolName, [
      `arguments are not valid JSON (${error instanceof Error ? error.message : String(error)})`
    ]);
  }

  if (!isPlainObject(parsed)) {
    throw new InvalidArgumentsError(toolName, ['arguments must be a JSON object']);
  }

  return Object.fromEntries(Object.entries(parsed).filter(([, value]) => value !== null));
}
