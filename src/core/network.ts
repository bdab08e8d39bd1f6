/**
 * Agentic Network
 *
 * Drives agents and an environment through an episode, one step at a
 * time. Within a step agents act in registration order; each agent's tool
 * calls run in the order the agent issued them, before the next agent acts.
 *
 * Usage:
 * ```typescript
 * const network = new AgenticNetwork({ environment });
 * network.register(new EchoAgent({ id: 'agent-1', llmClient }));
 *
 * const history = await network.run(3);
 * ```
 */

import type {
  Action,
  AgentId,
  AgentMessage,
  ExecutionMode,
  Observation,
  StepRecord,
  ToolCallAction,
  ToolInvocation,
  ToolResponse,
  ToolRouting,
} from '../types/index.js';
import type { Agent } from './agent.js';
import type { Environment } from '../environment/environment.js';
import { ToolExecutor } from '../environment/tool-executor.js';
import { normalizeTurn } from './actions.js';
import {
  AgentNetError,
  AgentNotFoundError,
  DuplicateAgentError,
} from './errors.js';

export interface AgenticNetworkOptions {
  environment: Environment;
  /** Defaults to the environment's executor */
  toolExecutor?: ToolExecutor;
  executionMode?: ExecutionMode;
  toolRouting?: ToolRouting;
  onProgress?: (message: string) => void;
  onStep?: (record: StepRecord) => void;
}

/**
 * What to do with an error raised during an agent's turn
 */
export type AgentErrorDecision = 'propagate' | 'terminate';

export class AgenticNetwork {
  readonly environment: Environment;
  readonly executionMode: ExecutionMode;
  readonly toolRouting: ToolRouting;

  private agents: Map<AgentId, Agent> = new Map();
  private latestObservations: Map<AgentId, Observation> = new Map();
  private agentExecutors: Map<AgentId, ToolExecutor> = new Map();
  private records: StepRecord[] = [];
  private stepCounter = 0;
  private episodeDone = false;
  private readonly executor: ToolExecutor | null;
  private readonly options: AgenticNetworkOptions;

  constructor(options: AgenticNetworkOptions) {
    this.options = options;
    this.environment = options.environment;
    this.executor = options.toolExecutor ?? options.environment.toolExecutor;
    this.executionMode = options.executionMode ?? 'streaming';
    this.toolRouting = options.toolRouting ?? 'executor';
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * @throws DuplicateAgentError if the id is taken; the existing agent stays
   */
  register(agent: Agent): void {
    if (this.agents.has(agent.id)) {
      throw new DuplicateAgentError(agent.id);
    }

    this.agents.set(agent.id, agent);
    try {
      this.environment.validateAgents(this.agentIds);
    } catch (error) {
      this.agents.delete(agent.id);
      throw error;
    }

    agent.attachContext({ environment: this.environment, network: this });
    this.log(`Registered agent ${agent.id}`);
  }

  unregister(id: AgentId): void {
    if (!this.agents.delete(id)) {
      throw new AgentNotFoundError(id);
    }
    this.latestObservations.delete(id);
    this.agentExecutors.delete(id);
    this.environment.validateAgents(this.agentIds);
  }

  get(id: AgentId): Agent {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new AgentNotFoundError(id);
    }
    return agent;
  }

  get agentIds(): AgentId[] {
    return [...this.agents.keys()];
  }

  get toolExecutor(): ToolExecutor | null {
    return this.executor;
  }

  get currentStep(): number {
    return this.stepCounter;
  }

  get isDone(): boolean {
    return this.episodeDone;
  }

  get history(): readonly StepRecord[] {
    return this.records;
  }

  // ==========================================================================
  // Episode
  // ==========================================================================

  /**
   * Start a fresh episode: reset agents and environment, clear the step
   * counter and history, and deliver the initial observations.
   */
  async reset(): Promise<Record<AgentId, Observation>> {
    this.stepCounter = 0;
    this.episodeDone = false;
    this.records = [];
    this.latestObservations.clear();

    for (const agent of this.agents.values()) {
      agent.reset();
    }

    const observations = await this.environment.reset();
    this.deliverObservations(observations);
    return observations;
  }

  /**
   * Reset, then advance up to `numSteps` steps. Stops early when the
   * environment ends the episode or no agent is left to act.
   *
   * @returns one record per executed step, in step order
   */
  async run(numSteps: number): Promise<StepRecord[]> {
    if (!Number.isInteger(numSteps) || numSteps < 0) {
      throw new AgentNetError(
        `numSteps must be a non-negative integer, got ${numSteps}`,
        'INVALID_ARGUMENT'
      );
    }

    await this.reset();

    for (let i = 0; i < numSteps; i++) {
      if (this.episodeDone || this.activeAgents().length === 0) {
        this.log(`Episode ended after ${this.stepCounter} steps`);
        break;
      }
      await this.step();
    }

    return [...this.records];
  }

  /**
   * Advance the episode by one step
   */
  async step(): Promise<StepRecord> {
    if (this.episodeDone) {
      throw new AgentNetError(
        'Episode is over. Call reset() to start a new one.',
        'EPISODE_FINISHED'
      );
    }

    const step = ++this.stepCounter;
    const actions = new Map<AgentId, Action[]>();
    const environmentActions = new Map<AgentId, Action[]>();
    const toolResults = new Map<AgentId, ToolResponse[]>();
    const messages: AgentMessage[] = [];

    this.log(`Step ${step}`);

    for (const agent of this.activeAgents()) {
      try {
        agent.beginTurn();
        const turn = normalizeTurn(await agent.act(this.observationFor(agent.id)));
        actions.set(agent.id, turn);

        const toolCalls = turn.filter(isToolCall);
        if (toolCalls.length > 0) {
          agent.awaitToolResults();
          toolResults.set(agent.id, await this.runToolCalls(agent, toolCalls));
        }

        environmentActions.set(
          agent.id,
          turn.filter((action) => action.kind !== 'tool_call')
        );
        for (const action of turn) {
          if (action.kind === 'message') {
            messages.push({
              sender: agent.id,
              recipient: action.recipient,
              content: action.content,
              metadata: action.metadata,
            });
          }
        }

        if (turn.some((action) => action.kind === 'terminate')) {
          agent.terminate();
          this.log(`Agent ${agent.id} terminated itself`);
        } else {
          agent.endTurn();
        }
      } catch (error) {
        if (this.handleAgentError(agent, error) === 'propagate') {
          this.abandonStep(agent, step);
          throw error;
        }
        agent.terminate();
        this.log(
          `Agent ${agent.id} terminated after error: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    this.deliverMessages(messages);

    const result = await this.environment.step({
      step,
      actions: environmentActions,
      toolResults,
    });

    // Agents retired by this step still see its outcome
    this.deliverObservations(result.observations);

    for (const id of result.terminatedAgents ?? []) {
      this.agents.get(id)?.terminate();
    }

    if (result.done) {
      this.episodeDone = true;
      for (const agent of this.agents.values()) {
        agent.terminate();
      }
    }

    const record: StepRecord = {
      step,
      actions,
      toolResults,
      observations: result.observations,
      done: result.done,
      rewards: result.rewards,
      info: result.info,
    };
    this.records.push(record);
    this.options.onStep?.(record);

    return record;
  }

  /**
   * Decide what an error raised during `agent`'s turn does to the run.
   * The default propagates it and halts; subclasses may return
   * 'terminate' to retire only that agent and carry on.
   */
  protected handleAgentError(_agent: Agent, _error: unknown): AgentErrorDecision {
    return 'propagate';
  }

  /**
   * Undo the bookkeeping of a step halted by `agent`'s error: the agent
   * leaves its turn and the step number is handed out again next time.
   * Work already done by earlier agents in the step is not undone.
   */
  private abandonStep(agent: Agent, step: number): void {
    if (agent.status === 'acting' || agent.status === 'waiting_for_result') {
      agent.endTurn();
    }
    this.stepCounter = step - 1;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private async runToolCalls(
    agent: Agent,
    calls: ToolCallAction[]
  ): Promise<ToolResponse[]> {
    const executor = this.executorFor(agent);
    const responses: ToolResponse[] = [];

    for (const { invocation } of calls) {
      const call: ToolInvocation = { ...invocation, caller: invocation.caller ?? agent.id };

      if (this.executionMode === 'streaming') {
        const handle = executor.dispatch(call);
        for await (const chunk of handle.chunks()) {
          agent.onToolResult(
            {
              invocationId: call.id,
              toolName: call.toolName,
              output: chunk.data,
              caller: call.caller,
              partial: true,
            },
            chunk
          );
        }
        const response = await handle.wait();
        agent.onToolResult(response);
        responses.push(response);
      } else {
        const response = await ToolExecutor.settle(await executor.execute(call));
        agent.onToolResult(response);
        responses.push(response);
      }
    }

    return responses;
  }

  /**
   * Tool calls go to the shared executor unless routing says otherwise or
   * there is none, in which case the agent's own registry serves them.
   */
  private executorFor(agent: Agent): ToolExecutor {
    if (this.toolRouting === 'executor' && this.executor) {
      return this.executor;
    }

    let executor = this.agentExecutors.get(agent.id);
    if (!executor) {
      executor = new ToolExecutor(agent.toolRegistry, {
        onProgress: this.options.onProgress,
      });
      this.agentExecutors.set(agent.id, executor);
    }
    return executor;
  }

  private deliverMessages(messages: AgentMessage[]): void {
    for (const message of messages) {
      if (message.recipient !== undefined) {
        const recipient = this.agents.get(message.recipient);
        if (recipient && !recipient.isTerminated) {
          recipient.onMessage(message);
        } else {
          this.log(`Dropped message from ${message.sender} to ${message.recipient}`);
        }
        continue;
      }

      for (const agent of this.activeAgents()) {
        if (agent.id !== message.sender) {
          agent.onMessage(message);
        }
      }
    }
  }

  /**
   * Hand out observations in registration order. Keys that name no
   * registered agent are ignored.
   */
  private deliverObservations(observations: Record<AgentId, Observation>): void {
    for (const [id, agent] of this.agents) {
      if (!Object.hasOwn(observations, id)) {
        continue;
      }
      const observation = observations[id];
      this.latestObservations.set(id, observation);
      if (!agent.isTerminated) {
        agent.observe(observation);
      }
    }
  }

  private observationFor(id: AgentId): Observation {
    return this.latestObservations.get(id) ?? { source: 'network', payload: {} };
  }

  private activeAgents(): Agent[] {
    return [...this.agents.values()].filter((agent) => !agent.isTerminated);
  }

  private log(message: string): void {
    this.options.onProgress?.(message);
  }
}

function isToolCall(action: Action): action is ToolCallAction {
  return action.kind === 'tool_call';
}
