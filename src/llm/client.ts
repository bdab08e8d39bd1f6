import type {
  LLMMessage,
  LLMRequestOptions,
  LLMResult,
  LLMStreamChunk,
} from '../types/index.js';
import { AgentNetError, LLMRequestError, LLMTimeoutError } from '../core/errors.js';

/**
 * Unified interface to an LLM provider.
 *
 * Clients are stateless: every call stands alone given its prompt or
 * message history. Vendor failures must surface as LLMRequestError and an
 * elapsed `timeoutMs` as LLMTimeoutError; nothing is retried here.
 */
export abstract class LLMClient {
  abstract complete(prompt: string, options?: LLMRequestOptions): Promise<LLMResult>;

  abstract chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResult>;

  /**
   * Stream a chat completion. Chunks arrive in generation order; the
   * sequence ends when the call does and cannot be replayed.
   *
   * The default delivers the whole `chat` result as a single chunk.
   */
  async *stream(
    messages: LLMMessage[],
    options?: LLMRequestOptions
  ): AsyncGenerator<LLMStreamChunk, void, undefined> {
    const result = await this.chat(messages, options);
    yield { textDelta: result.text, raw: result.raw };
  }

  /**
   * Hook for clients that need a call before their first real request
   */
  async warmup(): Promise<void> {}

  /**
   * Run `request` under the deadline in `options.timeoutMs` and the abort
   * signal in `options.signal`, mapping unexpected failures to
   * LLMRequestError. An already aborted signal fails before `request` runs.
   */
  protected async withDeadline<T>(
    request: () => Promise<T>,
    options?: LLMRequestOptions
  ): Promise<T> {
    const signal = options?.signal;
    if (signal?.aborted) {
      throw abortError(signal);
    }

    const work = request().catch((error: unknown) => {
      if (error instanceof AgentNetError) {
        throw error;
      }
      throw new LLMRequestError(
        `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    });

    const timeoutMs = options?.timeoutMs;
    if (timeoutMs === undefined && !signal) {
      return work;
    }

    // A failure that lands after the deadline or abort has nobody to report to
    work.catch(() => undefined);

    const interrupts: Promise<never>[] = [];
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    if (timeoutMs !== undefined) {
      interrupts.push(
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new LLMTimeoutError(timeoutMs)), timeoutMs);
        })
      );
    }
    if (signal) {
      interrupts.push(
        new Promise<never>((_, reject) => {
          onAbort = () => reject(abortError(signal));
          signal.addEventListener('abort', onAbort, { once: true });
        })
      );
    }

    try {
      return await Promise.race([work, ...interrupts]);
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }
}

function abortError(signal: AbortSignal): LLMRequestError {
  return new LLMRequestError('LLM request aborted', signal.reason);
}
