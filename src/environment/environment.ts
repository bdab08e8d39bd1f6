import type {
  AgentId,
  EnvironmentStepInput,
  EnvironmentStepResult,
  Observation,
} from '../types/index.js';
import type { ToolExecutor } from './tool-executor.js';

export interface EnvironmentOptions {
  toolExecutor?: ToolExecutor;
}

/**
 * Base class for the worlds agents act in.
 *
 * An environment owns its world state, produces one observation per
 * registered agent and decides when the episode is over. `step` must be
 * deterministic given the prior state and the actions unless the subclass
 * models stochastic dynamics, in which case the caller seeds it. Concrete
 * environments document whether the order of `input.actions` matters.
 */
export abstract class Environment {
  private executor: ToolExecutor | null;
  private agentIds: AgentId[] = [];

  constructor(options: EnvironmentOptions = {}) {
    this.executor = options.toolExecutor ?? null;
  }

  /**
   * Reinitialize world state and return one observation per agent
   */
  abstract reset():
    | Promise<Record<AgentId, Observation>>
    | Record<AgentId, Observation>;

  /**
   * Apply one step of agent actions and report the resulting world
   */
  abstract step(
    input: EnvironmentStepInput
  ): Promise<EnvironmentStepResult> | EnvironmentStepResult;

  get toolExecutor(): ToolExecutor | null {
    return this.executor;
  }

  bindToolExecutor(executor: ToolExecutor): void {
    this.executor = executor;
  }

  /**
   * Agents the environment produces observations for, in registration order
   */
  get registeredAgents(): readonly AgentId[] {
    return this.agentIds;
  }

  /**
   * Called by the network whenever its agent set changes. Subclasses may
   * throw to refuse an agent; the network then rolls the registration back.
   */
  validateAgents(agentIds: readonly AgentId[]): void {
    this.agentIds = [...agentIds];
  }
}
