// Failure kinds raised by the agent core. The HTTP layer maps them to status codes.

export enum ErrorCode {
  UNKNOWN_TOOL = 'unknown_tool',
  INVALID_ARGUMENTS = 'invalid_arguments',
  TOOL_EXECUTION_FAILURE = 'tool_execution_failure',
  DECISION_SERVICE_FAILURE = 'decision_service_failure',
  EMBEDDING_SERVICE_FAILURE = 'embedding_service_failure',
  INDEX_NOT_READY = 'index_not_ready',
  INVALID_ARGUMENT = 'invalid_argument',
  DUPLICATE_TOOL = 'duplicate_tool',
  SCHEMA_MISMATCH = 'schema_mismatch',
  CONFIGURATION_ERROR = 'configuration_error',
  SESSION_NOT_FOUND = 'not_found'
}

export class AgentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

export class UnknownToolError extends AgentError {
  constructor(public readonly toolName: string) {
    super(ErrorCode.UNKNOWN_TOOL, `Unknown tool "${toolName}"`, 400);
    this.name = 'UnknownToolError';
  }
}

export class InvalidArgumentsError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly issues: string[]
  ) {
    super(ErrorCode.INVALID_ARGUMENTS, `Invalid parameters for ${toolName}: ${issues.join('; ')}`, 400);
    this.name = 'InvalidArgumentsError';
  }
}

export class ToolExecutionError extends AgentError {
  constructor(
    public readonly toolName: string,
    cause: unknown
  ) {
    super(ErrorCode.TOOL_EXECUTION_FAILURE, `Tool ${toolName} failed: ${describeError(cause)}`, 502, { cause });
    this.name = 'ToolExecutionError';
  }
}

export class DecisionServiceError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.DECISION_SERVICE_FAILURE, message, 502, { cause });
    this.name = 'DecisionServiceError';
  }
}

export class EmbeddingServiceError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING_SERVICE_FAILURE, message, 502, { cause });
    this.name = 'EmbeddingServiceError';
  }
}

export class IndexNotReadyError extends AgentError {
  constructor(message = 'Scheme index has not been populated. Run the index build first.') {
    super(ErrorCode.INDEX_NOT_READY, message, 503);
    this.name = 'IndexNotReadyError';
  }
}

export class InvalidArgumentError extends AgentError {
  constructor(message: string) {
    super(ErrorCode.INVALID_ARGUMENT, message, 400);
    this.name = 'InvalidArgumentError';
  }
}

export class RegistryError extends AgentError {
  constructor(code: ErrorCode.DUPLICATE_TOOL | ErrorCode.SCHEMA_MISMATCH, message: string) {
    super(code, message, 500);
    this.name = 'RegistryError';
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super(ErrorCode.CONFIGURATION_ERROR, message, 500);
    this.name = 'ConfigurationError';
  }
}

export class SessionNotFoundError extends AgentError {
  constructor(public readonly sessionId: string) {
    super(ErrorCode.SESSION_NOT_FOUND, `Session ${sessionId} not found`, 404);
    this.name = 'SessionNotFoundError';
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export interface ErrorResponse {
  error: string;
  message: string;
}

export function formatErrorResponse(error: unknown, exposeInternal: boolean): { statusCode: number; body: ErrorResponse } {
  if (isAgentError(error)) {
    return { statusCode: error.statusCode, body: { error: error.code, message: error.message } };
  }
  return {
    statusCode: 500,
    body: {
      error: 'internal_error',
      message: exposeInternal ? describeError(error) : 'An unexpected error occurred'
    }
  };
}
