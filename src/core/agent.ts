/**
 * Agent Base Class
 *
 * An agent owns a tool registry and holds an LLM client. Each network step
 * it turns its latest observation into one or more actions; the network
 * then feeds tool results, messages and the next observation back through
 * the hooks below.
 */

import type {
  AgentId,
  AgentMessage,
  AgentStatus,
  AgentTurn,
  Observation,
  ToolChunk,
  ToolResponse,
} from '../types/index.js';
import type { LLMClient } from '../llm/client.js';
import type { Environment } from '../environment/environment.js';
import type { AgenticNetwork } from './network.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { AgentStateError } from './errors.js';

/**
 * Runtime handles injected by the network on registration
 */
export interface AgentContext {
  environment: Environment;
  network: AgenticNetwork;
  metadata?: Record<string, unknown>;
}

export interface AgentOptions {
  id: AgentId;
  llmClient: LLMClient;
  /** Defaults to an empty registry */
  toolRegistry?: ToolRegistry;
  onProgress?: (message: string) => void;
}

const transitions: Record<AgentStatus, AgentStatus[]> = {
  idle: ['acting', 'terminated'],
  acting: ['waiting_for_result', 'idle', 'terminated'],
  waiting_for_result: ['idle', 'terminated'],
  terminated: [],
};

export abstract class Agent {
  readonly id: AgentId;
  readonly llmClient: LLMClient;
  readonly toolRegistry: ToolRegistry;

  private currentStatus: AgentStatus = 'idle';
  private attachedContext: AgentContext | null = null;
  private readonly onProgress?: (message: string) => void;

  constructor(options: AgentOptions) {
    this.id = options.id;
    this.llmClient = options.llmClient;
    this.toolRegistry = options.toolRegistry ?? new ToolRegistry();
    this.onProgress = options.onProgress;
  }

  /**
   * Produce this step's action(s) from the latest observation
   */
  abstract act(observation: Observation): Promise<AgentTurn> | AgentTurn;

  /**
   * Receive the observation that the next `act` call will be given
   */
  observe(_observation: Observation): void {}

  /**
   * Receive a tool result. In streaming mode this runs once per partial
   * chunk (with `chunk` set and `result.partial` true) before the final call.
   */
  onToolResult(_result: ToolResponse, _chunk?: ToolChunk): void {}

  /**
   * Receive a message sent by another agent
   */
  onMessage(_message: AgentMessage): void {}

  /**
   * Clear internal state between episodes
   */
  protected onReset(): void {}

  protected onContextAttached(_context: AgentContext): void {}

  get status(): AgentStatus {
    return this.currentStatus;
  }

  get isTerminated(): boolean {
    return this.currentStatus === 'terminated';
  }

  get context(): AgentContext | null {
    return this.attachedContext;
  }

  attachContext(context: AgentContext): void {
    this.attachedContext = context;
    this.onContextAttached(context);
  }

  reset(): void {
    this.currentStatus = 'idle';
    this.onReset();
  }

  // Lifecycle, driven by the network: idle → acting → waiting_for_result → idle

  beginTurn(): void {
    this.transition('acting');
  }

  awaitToolResults(): void {
    this.transition('waiting_for_result');
  }

  endTurn(): void {
    this.transition('idle');
  }

  terminate(): void {
    if (!this.isTerminated) {
      this.transition('terminated');
    }
  }

  protected log(message: string): void {
    this.onProgress?.(`[${this.id}] ${message}`);
  }

  private transition(to: AgentStatus): void {
    if (!transitions[this.currentStatus].includes(to)) {
      throw new AgentStateError(this.id, this.currentStatus, to);
    }
    this.currentStatus = to;
  }
}
