import type { ZodIssue } from 'zod';

/**
 * Base class for every error raised by agentnet components.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class AgentNetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'AgentNetError';
  }
}

// ============================================================================
// Tools
// ============================================================================

export class DuplicateToolError extends AgentNetError {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' is already registered`, 'DUPLICATE_TOOL');
    this.name = 'DuplicateToolError';
  }
}

export class ToolNotFoundError extends AgentNetError {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' not found`, 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}

export class SchemaValidationError extends AgentNetError {
  constructor(
    public readonly toolName: string,
    public readonly direction: 'request' | 'response',
    public readonly issues: ZodIssue[]
  ) {
    super(
      `Invalid ${direction} for tool '${toolName}': ${formatIssues(issues)}`,
      'SCHEMA_VALIDATION'
    );
    this.name = 'SchemaValidationError';
  }
}

export class ExecutionError extends AgentNetError {
  constructor(
    public readonly toolName: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Tool '${toolName}' failed: ${detail}`, 'EXECUTION_FAILED', cause);
    this.name = 'ExecutionError';
  }
}

// ============================================================================
// LLM
// ============================================================================

export class LLMRequestError extends AgentNetError {
  constructor(message: string, cause?: unknown) {
    super(message, 'LLM_REQUEST_FAILED', cause);
    this.name = 'LLMRequestError';
  }
}

export class LLMTimeoutError extends AgentNetError {
  constructor(public readonly timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`, 'LLM_TIMEOUT');
    this.name = 'LLMTimeoutError';
  }
}

// ============================================================================
// Agents
// ============================================================================

export class DuplicateAgentError extends AgentNetError {
  constructor(public readonly agentId: string) {
    super(`Agent '${agentId}' is already registered`, 'DUPLICATE_AGENT');
    this.name = 'DuplicateAgentError';
  }
}

export class AgentNotFoundError extends AgentNetError {
  constructor(public readonly agentId: string) {
    super(`Agent '${agentId}' is not registered`, 'AGENT_NOT_FOUND');
    this.name = 'AgentNotFoundError';
  }
}

export class AgentStateError extends AgentNetError {
  constructor(agentId: string, from: string, to: string) {
    super(
      `Agent '${agentId}' cannot move from '${from}' to '${to}'`,
      'AGENT_STATE'
    );
    this.name = 'AgentStateError';
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigError extends AgentNetError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
