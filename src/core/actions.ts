/**
 * Builders for agent actions and the ids they carry
 */

import type {
  Action,
  AgentId,
  AgentTurn,
  EnvironmentAction,
  MessageAction,
  TerminateAction,
  ToolCallAction,
} from '../types/index.js';

/**
 * Generate unique ids for invocations
 */
export const IdGenerator = {
  /**
   * Format: call-YYYYMMDDHHMMSS-XXXX
   */
  invocation(): string {
    const timestamp = new Date().toISOString().replace(/[-:T.Z]/g, '').slice(0, 14);
    const random = Math.random().toString(36).slice(2, 6);
    return `call-${timestamp}-${random}`;
  },
};

export const Actions = {
  message(
    content: string,
    options: { recipient?: AgentId; metadata?: Record<string, unknown> } = {}
  ): MessageAction {
    return { kind: 'message', content, ...options };
  },

  toolCall(
    toolName: string,
    args: unknown,
    caller?: AgentId,
    metadata?: Record<string, unknown>
  ): ToolCallAction {
    return {
      kind: 'tool_call',
      invocation: {
        id: IdGenerator.invocation(),
        toolName,
        arguments: args,
        caller,
        metadata,
      },
    };
  },

  environment(payload: Record<string, unknown>): EnvironmentAction {
    return { kind: 'environment', payload };
  },

  terminate(reason?: string): TerminateAction {
    return { kind: 'terminate', reason };
  },
};

/**
 * Flatten a turn into its ordered list of actions
 */
export function normalizeTurn(turn: AgentTurn): Action[] {
  return isActionList(turn) ? [...turn] : [turn];
}

function isActionList(turn: AgentTurn): turn is readonly Action[] {
  return Array.isArray(turn);
}
