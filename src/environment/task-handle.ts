import type {
  TaskState,
  ToolChunk,
  ToolInvocation,
  ToolResponse,
} from '../types/index.js';
import { AsyncQueue } from '../core/internal/async-queue.js';

/**
 * Emits one partial output of a running tool
 */
export type ChunkEmitter = (data: unknown) => void;

/**
 * Handle on a tool invocation dispatched without waiting for it.
 *
 * The task starts as soon as the handle is created. `poll()` reports the
 * state without blocking, `wait()` resolves with the final response (or
 * rejects with the tool's error) and `chunks()` yields the partial outputs
 * in generation order, ending when the task settles. Chunks are buffered
 * until read and can be read once.
 */
export class TaskHandle {
  private state: TaskState = { status: 'pending' };
  private readonly queue = new AsyncQueue<ToolChunk>();
  private readonly settled: Promise<ToolResponse>;
  private chunkIndex = 0;

  constructor(
    readonly invocation: ToolInvocation,
    run: (emit: ChunkEmitter) => Promise<ToolResponse>
  ) {
    this.settled = run((data) => this.emit(data)).then(
      (response) => {
        this.state = { status: 'completed', response };
        this.queue.close();
        return response;
      },
      (error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.state = { status: 'failed', error: failure };
        this.queue.close();
        throw failure;
      }
    );
    // Failures surface through wait() and poll(); this keeps an unobserved
    // handle from being reported as an unhandled rejection.
    this.settled.catch(() => this.state);
  }

  get id(): string {
    return this.invocation.id;
  }

  poll(): TaskState {
    return this.state;
  }

  get isSettled(): boolean {
    return this.state.status !== 'pending';
  }

  wait(): Promise<ToolResponse> {
    return this.settled;
  }

  chunks(): AsyncIterable<ToolChunk> {
    return this.queue;
  }

  private emit(data: unknown): void {
    this.queue.push({
      invocationId: this.invocation.id,
      toolName: this.invocation.toolName,
      index: this.chunkIndex++,
      data,
    });
  }
}
