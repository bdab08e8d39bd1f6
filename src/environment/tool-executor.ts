/**
 * Tool Executor
 *
 * Environment-side dispatcher for tool invocations. The execution policy
 * decides how a call runs:
 *
 * - sync: invoke and await the result
 * - async: start the call and hand back a TaskHandle immediately
 * - sandboxed: invoke through the configured ToolSandbox
 *
 * There is no retry. A failed call surfaces to the caller.
 */

import type {
  ExecutionPolicy,
  ToolInvocation,
  ToolResponse,
} from '../types/index.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { TaskHandle, type ChunkEmitter } from './task-handle.js';
import { AgentNetError, ExecutionError } from '../core/errors.js';

/**
 * Isolation boundary used by the `sandboxed` policy. The executor only
 * guarantees that every sandboxed call goes through `run`.
 */
export interface ToolSandbox {
  readonly name: string;
  run<T>(invocation: ToolInvocation, task: () => Promise<T>): Promise<T>;
}

export const passthroughSandbox: ToolSandbox = {
  name: 'passthrough',
  run: (_invocation, task) => task(),
};

export interface ToolExecutorOptions {
  policy?: ExecutionPolicy;
  /** Per-call deadline; exceeding it fails the call with ExecutionError */
  timeoutMs?: number;
  sandbox?: ToolSandbox;
  onProgress?: (message: string) => void;
}

export type Execution =
  | { status: 'completed'; response: ToolResponse }
  | { status: 'pending'; handle: TaskHandle };

export class ToolExecutor {
  readonly policy: ExecutionPolicy;
  private readonly timeoutMs?: number;
  private readonly sandbox: ToolSandbox;
  private readonly onProgress?: (message: string) => void;

  constructor(
    readonly registry: ToolRegistry,
    options: ToolExecutorOptions = {}
  ) {
    this.policy = options.policy ?? 'sync';
    this.timeoutMs = options.timeoutMs;
    this.sandbox = options.sandbox ?? passthroughSandbox;
    this.onProgress = options.onProgress;
  }

  /**
   * Run an invocation according to the executor's policy.
   *
   * @throws ToolNotFoundError before anything is dispatched
   */
  async execute(invocation: ToolInvocation): Promise<Execution> {
    this.registry.get(invocation.toolName);

    if (this.policy === 'async') {
      return { status: 'pending', handle: this.dispatch(invocation) };
    }

    const response = await this.run(invocation);
    return { status: 'completed', response };
  }

  /**
   * Start an invocation and return its handle without waiting, whatever the
   * policy. Partial tool output is available through `handle.chunks()`.
   */
  dispatch(invocation: ToolInvocation): TaskHandle {
    this.registry.get(invocation.toolName);
    return new TaskHandle(invocation, (emit) => this.run(invocation, emit));
  }

  /**
   * Await an execution to its final response
   */
  static async settle(execution: Execution): Promise<ToolResponse> {
    return execution.status === 'completed'
      ? execution.response
      : execution.handle.wait();
  }

  private run(invocation: ToolInvocation, emit?: ChunkEmitter): Promise<ToolResponse> {
    this.log(`[${this.policy}] ${invocation.toolName} (${invocation.id})`);

    const task = () => this.withDeadline(invocation, this.call(invocation, emit));

    return this.policy === 'sandboxed'
      ? this.sandbox.run(invocation, task)
      : task();
  }

  private async call(
    invocation: ToolInvocation,
    emit?: ChunkEmitter
  ): Promise<ToolResponse> {
    try {
      let output: unknown;
      if (emit) {
        const stream = this.registry.stream(invocation.toolName, invocation.arguments);
        let next = await stream.next();
        while (!next.done) {
          emit(next.value);
          next = await stream.next();
        }
        output = next.value;
      } else {
        output = await this.registry.invoke(invocation.toolName, invocation.arguments);
      }

      return {
        invocationId: invocation.id,
        toolName: invocation.toolName,
        output,
        caller: invocation.caller,
      };
    } catch (error) {
      // Registry errors (unknown tool, schema mismatch) keep their type
      if (error instanceof AgentNetError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ExecutionError(invocation.toolName, detail, error);
    }
  }

  private async withDeadline<T>(
    invocation: ToolInvocation,
    work: Promise<T>
  ): Promise<T> {
    if (this.timeoutMs === undefined) {
      return work;
    }

    const timeoutMs = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new ExecutionError(invocation.toolName, `timed out after ${timeoutMs}ms`)
          ),
        timeoutMs
      );
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private log(message: string): void {
    this.onProgress?.(message);
  }
}
