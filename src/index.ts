export * from './types/index.js';
export * from './core/errors.js';

export {
  AgentNetConfigSchema,
  DEFAULT_CONFIG,
  type AgentNetConfig,
  type AgentNetConfigInput,
} from './types/config.js';
export { loadConfig, CONFIG_FILENAME } from './cli/utils/config.js';

export { BaseTool, type AnyTool } from './tools/base-tool.js';
export { ToolRegistry } from './tools/tool-registry.js';

export { LLMClient } from './llm/client.js';

export { Agent, type AgentContext, type AgentOptions } from './core/agent.js';
export { Actions, IdGenerator, normalizeTurn } from './core/actions.js';
export {
  AgenticNetwork,
  type AgenticNetworkOptions,
  type AgentErrorDecision,
} from './core/network.js';

export { Environment, type EnvironmentOptions } from './environment/environment.js';
export {
  ToolExecutor,
  passthroughSandbox,
  type Execution,
  type ToolExecutorOptions,
  type ToolSandbox,
} from './environment/tool-executor.js';
export { TaskHandle, type ChunkEmitter } from './environment/task-handle.js';

export {
  buildDemoNetwork,
  DummyLLMClient,
  EchoAgent,
  EchoTool,
  SimpleEnvironment,
  type DemoNetworkOptions,
} from './demo/index.js';
