import type {
  AgentTurn,
  LLMRequestOptions,
  Observation,
  ToolResponse,
} from '../types/index.js';
import { Agent, type AgentOptions } from '../core/agent.js';
import { Actions } from '../core/actions.js';

/**
 * Agent that runs its latest observation through the LLM, sends the
 * completion as a message and asks the echo tool to repeat it.
 */
export interface EchoAgentOptions extends AgentOptions {
  requestOptions?: LLMRequestOptions;
}

export class EchoAgent extends Agent {
  private lastEcho: string | null = null;
  private readonly requestOptions?: LLMRequestOptions;

  constructor(options: EchoAgentOptions) {
    super(options);
    this.requestOptions = options.requestOptions;
  }

  get lastToolEcho(): string | null {
    return this.lastEcho;
  }

  async act(observation: Observation): Promise<AgentTurn> {
    const message = observation.payload.message;
    const prompt = typeof message === 'string' ? message : '';

    const result = await this.llmClient.complete(prompt, this.requestOptions);

    return [
      Actions.toolCall('echo', { text: result.text }, this.id),
      Actions.message(result.text),
    ];
  }

  onToolResult(result: ToolResponse): void {
    if (result.partial) {
      return;
    }
    const output = result.output;
    if (output !== null && typeof output === 'object' && 'text' in output && typeof output.text === 'string') {
      this.lastEcho = output.text;
      this.log(`Tool ${result.toolName} responded: ${output.text}`);
    }
  }

  protected onReset(): void {
    this.lastEcho = null;
  }
}
