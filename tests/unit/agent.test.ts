import { describe, it, expect, beforeEach } from 'vitest';
import type { AgentTurn, Observation } from '../../src/types/index.js';
import { Agent } from '../../src/core/agent.js';
import { Actions, normalizeTurn } from '../../src/core/actions.js';
import { AgentStateError } from '../../src/core/errors.js';
import { DummyLLMClient } from '../../src/demo/dummy-llm-client.js';

class CountingAgent extends Agent {
  resets = 0;

  act(_observation: Observation): AgentTurn {
    return Actions.message('hi');
  }

  protected onReset(): void {
    this.resets += 1;
  }
}

describe('Agent', () => {
  let agent: CountingAgent;

  beforeEach(() => {
    agent = new CountingAgent({ id: 'agent-1', llmClient: new DummyLLMClient() });
  });

  it('should start idle with an empty registry', () => {
    expect(agent.status).toBe('idle');
    expect(agent.toolRegistry.size).toBe(0);
    expect(agent.context).toBeNull();
  });

  it('should cycle idle → acting → waiting_for_result → idle', () => {
    agent.beginTurn();
    expect(agent.status).toBe('acting');

    agent.awaitToolResults();
    expect(agent.status).toBe('waiting_for_result');

    agent.endTurn();
    expect(agent.status).toBe('idle');
  });

  it('should allow a turn without tool calls', () => {
    agent.beginTurn();
    agent.endTurn();

    expect(agent.status).toBe('idle');
  });

  it('should reject transitions the lifecycle does not allow', () => {
    expect(() => agent.awaitToolResults()).toThrow(AgentStateError);
    expect(() => agent.endTurn()).toThrow("Agent 'agent-1' cannot move from 'idle' to 'idle'");
  });

  it('should stay terminated', () => {
    agent.terminate();
    agent.terminate();

    expect(agent.isTerminated).toBe(true);
    expect(() => agent.beginTurn()).toThrow(AgentStateError);
  });

  it('should return to idle and clear state on reset', () => {
    agent.beginTurn();
    agent.terminate();
    agent.reset();

    expect(agent.status).toBe('idle');
    expect(agent.resets).toBe(1);
  });
});

describe('Actions', () => {
  it('should build a tool call with a fresh invocation id', () => {
    const first = Actions.toolCall('echo', { text: 'hi' }, 'agent-1');
    const second = Actions.toolCall('echo', { text: 'hi' }, 'agent-1');

    expect(first.invocation).toMatchObject({
      toolName: 'echo',
      arguments: { text: 'hi' },
      caller: 'agent-1',
    });
    expect(first.invocation.id).toMatch(/^call-\d{14}-[a-z0-9]*$/);
    expect(first.invocation.id).not.toBe(second.invocation.id);
  });

  it('should build message, environment and terminate actions', () => {
    expect(Actions.message('hello', { recipient: 'b' })).toEqual({
      kind: 'message',
      content: 'hello',
      recipient: 'b',
    });
    expect(Actions.environment({ move: 'north' })).toEqual({
      kind: 'environment',
      payload: { move: 'north' },
    });
    expect(Actions.terminate('done')).toEqual({ kind: 'terminate', reason: 'done' });
  });
});

describe('normalizeTurn', () => {
  it('should wrap a single action', () => {
    const action = Actions.message('solo');

    expect(normalizeTurn(action)).toEqual([action]);
  });

  it('should copy a list of actions in order', () => {
    const turn = [Actions.message('one'), Actions.terminate()];

    const actions = normalizeTurn(turn);

    expect(actions).toEqual(turn);
    expect(actions).not.toBe(turn);
  });
});
