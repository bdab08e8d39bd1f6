/**
 * Core types for agentnet - agents, tools and environments wired into a network
 */

import type { ZodTypeAny } from 'zod';

export type AgentId = string;

// ============================================================================
// Tool Types
// ============================================================================

/**
 * Instruction to execute a tool, usually produced by an agent turn.
 */
export interface ToolInvocation {
  id: string;
  toolName: string;
  /** Request payload, validated against the tool's request schema */
  arguments: unknown;
  /** Agent that asked for the call */
  caller?: AgentId;
  metadata?: Record<string, unknown>;
}

export interface ToolResponse {
  invocationId: string;
  toolName: string;
  output: unknown;
  caller?: AgentId;
  /** True while a streamed call has not finished yet */
  partial?: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * A partial output emitted by a streaming tool
 */
export interface ToolChunk {
  invocationId: string;
  toolName: string;
  index: number;
  data: unknown;
}

export interface ToolMetadata {
  name: string;
  description: string;
  requestSchema: ZodTypeAny;
  responseSchema: ZodTypeAny;
}

/**
 * How the tool executor dispatches an invocation
 */
export type ExecutionPolicy = 'sync' | 'async' | 'sandboxed';

export type TaskState =
  | { status: 'pending' }
  | { status: 'completed'; response: ToolResponse }
  | { status: 'failed'; error: Error };

// ============================================================================
// LLM Types
// ============================================================================

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  name?: string;
  metadata?: Record<string, unknown>;
}

export interface LLMUsage {
  inputTokens?: number;
  outputTokens?: number;
}

export interface LLMResult {
  text: string;
  /** Provider payload, kept for callers that need vendor details */
  raw: Record<string, unknown>;
  usage?: LLMUsage;
}

export interface LLMStreamChunk {
  textDelta: string;
  raw: Record<string, unknown>;
}

export interface LLMRequestOptions {
  temperature?: number;
  maxTokens?: number;
  /** Deadline for the whole call; exceeding it raises LLMTimeoutError */
  timeoutMs?: number;
  /** Aborting fails the call with LLMRequestError */
  signal?: AbortSignal;
}

// ============================================================================
// Agent Types
// ============================================================================

export type AgentStatus = 'idle' | 'acting' | 'waiting_for_result' | 'terminated';

export interface Observation {
  /** Who produced the observation, e.g. "environment" */
  source: string;
  payload: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface AgentMessage {
  sender: AgentId;
  /** Absent means broadcast to every other agent */
  recipient?: AgentId;
  content: string;
  metadata?: Record<string, unknown>;
}

export type MessageAction = {
  kind: 'message';
  content: string;
  recipient?: AgentId;
  metadata?: Record<string, unknown>;
};

export type ToolCallAction = {
  kind: 'tool_call';
  invocation: ToolInvocation;
};

export type EnvironmentAction = {
  kind: 'environment';
  payload: Record<string, unknown>;
};

export type TerminateAction = {
  kind: 'terminate';
  reason?: string;
};

export type Action =
  | MessageAction
  | ToolCallAction
  | EnvironmentAction
  | TerminateAction;

/**
 * What a single agent turn may return
 */
export type AgentTurn = Action | readonly Action[];

// ============================================================================
// Environment Types
// ============================================================================

export interface EnvironmentStepInput {
  step: number;
  /** Non-tool actions per agent, in registration order */
  actions: Map<AgentId, Action[]>;
  /** Tool results produced during this step, per calling agent */
  toolResults: Map<AgentId, ToolResponse[]>;
}

export interface EnvironmentStepResult {
  observations: Record<AgentId, Observation>;
  /** Global termination of the episode */
  done: boolean;
  /** Agents that must not act again this episode */
  terminatedAgents?: AgentId[];
  rewards?: Record<AgentId, number>;
  info?: Record<string, unknown>;
}

// ============================================================================
// Network Types
// ============================================================================

/**
 * streaming: tool results reach the agent chunk by chunk as they arrive
 * offline: the agent only sees the completed tool result
 */
export type ExecutionMode = 'streaming' | 'offline';

/**
 * Where tool calls coming out of an agent turn are sent
 */
export type ToolRouting = 'executor' | 'agent';

export interface StepRecord {
  step: number;
  /** Every action of the step, in registration order */
  actions: Map<AgentId, Action[]>;
  toolResults: Map<AgentId, ToolResponse[]>;
  observations: Record<AgentId, Observation>;
  done: boolean;
  rewards?: Record<AgentId, number>;
  info?: Record<string, unknown>;
}
