import type {
  AgentId,
  AgentMessage,
  AgentStatus,
  AgentTurn,
  EnvironmentStepInput,
  EnvironmentStepResult,
  Observation,
  ToolChunk,
  ToolResponse,
} from '../../src/types/index.js';
import { Agent, type AgentOptions } from '../../src/core/agent.js';
import { Environment, type EnvironmentOptions } from '../../src/environment/environment.js';
import { Actions } from '../../src/core/actions.js';
import { DummyLLMClient } from '../../src/demo/dummy-llm-client.js';

export type Script = (observation: Observation, turn: number) => AgentTurn | Promise<AgentTurn>;

/**
 * Agent driven by a script that records everything the network hands it
 */
export class ScriptedAgent extends Agent {
  readonly observed: Observation[] = [];
  readonly actedOn: Observation[] = [];
  readonly toolResults: Array<{ result: ToolResponse; chunk?: ToolChunk; status: AgentStatus }> = [];
  readonly messages: AgentMessage[] = [];
  readonly messagesSeenWhileActing: number[] = [];
  readonly statusWhileActing: AgentStatus[] = [];
  private turns = 0;

  constructor(
    id: AgentId,
    private readonly script: Script = () => Actions.message(`from ${id}`),
    options: Partial<AgentOptions> = {}
  ) {
    super({ llmClient: new DummyLLMClient(), ...options, id });
  }

  async act(observation: Observation): Promise<AgentTurn> {
    this.turns += 1;
    this.actedOn.push(observation);
    this.statusWhileActing.push(this.status);
    this.messagesSeenWhileActing.push(this.messages.length);
    return this.script(observation, this.turns);
  }

  observe(observation: Observation): void {
    this.observed.push(observation);
  }

  onToolResult(result: ToolResponse, chunk?: ToolChunk): void {
    this.toolResults.push({ result, chunk, status: this.status });
  }

  onMessage(message: AgentMessage): void {
    this.messages.push(message);
  }

  get turnCount(): number {
    return this.turns;
  }
}

export interface RecordingEnvironmentOptions extends EnvironmentOptions {
  /** End the episode once this many steps have run */
  doneAfter?: number;
  /** Agents to retire, keyed by the step that retires them */
  retire?: Record<number, AgentId[]>;
  /** Ids this environment refuses to host */
  refuse?: AgentId[];
}

/**
 * Environment that records every input and observes `{ prompt, step }`
 */
export class RecordingEnvironment extends Environment {
  readonly inputs: EnvironmentStepInput[] = [];
  resets = 0;
  private readonly settings: RecordingEnvironmentOptions;

  constructor(settings: RecordingEnvironmentOptions = {}) {
    super(settings);
    this.settings = settings;
  }

  validateAgents(agentIds: readonly AgentId[]): void {
    const refused = agentIds.find((id) => this.settings.refuse?.includes(id));
    if (refused) {
      throw new Error(`Environment refuses agent ${refused}`);
    }
    super.validateAgents(agentIds);
  }

  reset(): Record<AgentId, Observation> {
    this.resets += 1;
    return this.observations(0);
  }

  async step(input: EnvironmentStepInput): Promise<EnvironmentStepResult> {
    this.inputs.push(input);
    return {
      observations: this.observations(input.step),
      done: input.step >= (this.settings.doneAfter ?? Number.POSITIVE_INFINITY),
      terminatedAgents: this.settings.retire?.[input.step],
      rewards: Object.fromEntries(
        this.registeredAgents.map((id): [AgentId, number] => [id, input.step])
      ),
    };
  }

  get lastInput(): EnvironmentStepInput | undefined {
    return this.inputs[this.inputs.length - 1];
  }

  private observations(step: number): Record<AgentId, Observation> {
    return Object.fromEntries(
      this.registeredAgents.map((id): [AgentId, Observation] => [
        id,
        { source: 'environment', payload: { prompt: 'go', step } },
      ])
    );
  }
}
