/**
 * Demo wiring: one EchoAgent in a SimpleEnvironment, talking to an offline
 * LLM client and an echo tool.
 */

import type { StepRecord } from '../types/index.js';
import { DEFAULT_CONFIG, type AgentNetConfig } from '../types/config.js';
import { AgenticNetwork } from '../core/network.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ToolExecutor } from '../environment/tool-executor.js';
import { EchoTool } from './echo-tool.js';
import { DummyLLMClient } from './dummy-llm-client.js';
import { SimpleEnvironment } from './simple-environment.js';
import { EchoAgent } from './echo-agent.js';

export { EchoTool } from './echo-tool.js';
export { DummyLLMClient } from './dummy-llm-client.js';
export { SimpleEnvironment } from './simple-environment.js';
export { EchoAgent } from './echo-agent.js';

export interface DemoNetworkOptions {
  config?: AgentNetConfig;
  onProgress?: (message: string) => void;
  onStep?: (record: StepRecord) => void;
}

export function buildDemoNetwork(options: DemoNetworkOptions = {}): AgenticNetwork {
  const config = options.config ?? DEFAULT_CONFIG;

  // The environment and the agent each get their own echo tool
  const toolExecutor = new ToolExecutor(new ToolRegistry([new EchoTool()]), {
    policy: config.executor.policy,
    timeoutMs: config.executor.timeoutMs,
    onProgress: options.onProgress,
  });
  const environment = new SimpleEnvironment({
    toolExecutor,
    maxSteps: config.network.maxSteps,
  });

  const network = new AgenticNetwork({
    environment,
    executionMode: config.network.executionMode,
    toolRouting: config.network.toolRouting,
    onProgress: options.onProgress,
    onStep: options.onStep,
  });

  network.register(
    new EchoAgent({
      id: 'agent-1',
      llmClient: new DummyLLMClient(),
      toolRegistry: new ToolRegistry([new EchoTool()]),
      requestOptions: { timeoutMs: config.llm.timeoutMs },
      onProgress: options.onProgress,
    })
  );

  return network;
}
