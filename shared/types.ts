export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ToolArguments = Record<string, unknown>;

export interface ToolCallRequest {
  id: string;
  toolName: string;
  arguments: ToolArguments;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantTextMessage {
  role: 'assistant';
  content: string;
}

export interface AssistantToolCallMessage {
  role: 'assistant';
  content: null;
  toolCalls: ToolCallRequest[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

export type ChatMessage =
  | SystemMessage
  | UserMessage
  | AssistantTextMessage
  | AssistantToolCallMessage
  | ToolResultMessage;

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ParameterSpec {
  type: ParameterType;
  description: string;
  required: boolean;
  enum?: string[];
  items?: { type: ParameterType };
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ParameterSpec>;
}

export interface SchemeDocument {
  id: string;
  title: string;
  description: string;
  category: string;
  eligibility: string[];
  benefits: string[];
  applicationProcess: string;
  requiredDocuments: string[];
  contactInfo: string;
  website: string;
  state?: string | null;
}

export interface RetrievalResult {
  documentId: string;
  distance: number;
  rank: number;
}

export interface AgentThought {
  timestamp: string;
  step: string;
  reasoning: string;
  action: string;
  details?: Record<string, unknown>;
}

export interface ChatRequestPayload {
  message: string;
  sessionId?: string;
  imagePath?: string;
}

export interface ChatResponse {
  response: string;
  sessionId: string;
}

export interface SessionTranscript {
  sessionId: string;
  messages: ChatMessage[];
  thoughts: AgentThought[];
  updatedAt: string;
}
