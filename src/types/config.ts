import { z } from 'zod';

/**
 * Zod schema for .agentnet.yaml configuration validation
 */

export const NetworkConfigSchema = z.object({
  maxSteps: z.number().int().positive().default(3),
  executionMode: z.enum(['streaming', 'offline']).default('streaming'),
  toolRouting: z.enum(['executor', 'agent']).default('executor'),
});

export const ExecutorConfigSchema = z.object({
  policy: z.enum(['sync', 'async', 'sandboxed']).default('sync'),
  timeoutMs: z.number().int().positive().optional(),
});

export const AgentNetConfigSchema = z.object({
  network: NetworkConfigSchema.default(() => ({
    maxSteps: 3,
    executionMode: 'streaming' as const,
    toolRouting: 'executor' as const,
  })),

  executor: ExecutorConfigSchema.default(() => ({
    policy: 'sync' as const,
    timeoutMs: undefined,
  })),

  llm: z
    .object({
      timeoutMs: z.number().int().positive().optional(),
    })
    .default(() => ({ timeoutMs: undefined })),
});

export type AgentNetConfigInput = z.input<typeof AgentNetConfigSchema>;
export type AgentNetConfig = z.output<typeof AgentNetConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AgentNetConfig = AgentNetConfigSchema.parse({});
