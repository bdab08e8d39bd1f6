import type {
  AgentId,
  EnvironmentStepInput,
  EnvironmentStepResult,
  Observation,
} from '../types/index.js';
import { Environment, type EnvironmentOptions } from '../environment/environment.js';

export interface SimpleEnvironmentOptions extends EnvironmentOptions {
  maxSteps?: number;
}

/**
 * Toy environment that loops each agent's message back to it.
 *
 * Each agent observes the last message (or `environment` action carrying a
 * `message` field) it sent this step, or "no-action". Agents do not see
 * each other, so action order has no effect. The episode ends globally
 * after `maxSteps` steps.
 */
export class SimpleEnvironment extends Environment {
  private readonly maxSteps: number;
  private stepCounter = 0;

  constructor(options: SimpleEnvironmentOptions = {}) {
    super(options);
    this.maxSteps = options.maxSteps ?? 3;
  }

  reset(): Record<AgentId, Observation> {
    this.stepCounter = 0;
    return Object.fromEntries(
      this.registeredAgents.map((id): [AgentId, Observation] => [id, this.observation('welcome')])
    );
  }

  step(input: EnvironmentStepInput): EnvironmentStepResult {
    this.stepCounter += 1;

    const observations = Object.fromEntries(
      this.registeredAgents.map((id): [AgentId, Observation] => [
        id,
        this.observation(lastMessage(input, id) ?? 'no-action'),
      ])
    );

    return {
      observations,
      done: this.stepCounter >= this.maxSteps,
    };
  }

  private observation(message: string): Observation {
    return {
      source: 'environment',
      payload: { message },
      metadata: { step: this.stepCounter },
    };
  }
}

function lastMessage(input: EnvironmentStepInput, id: AgentId): string | undefined {
  let message: string | undefined;
  for (const action of input.actions.get(id) ?? []) {
    if (action.kind === 'message') {
      message = action.content;
    } else if (action.kind === 'environment' && typeof action.payload.message === 'string') {
      message = action.payload.message;
    }
  }
  return message;
}
