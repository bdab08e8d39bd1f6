import type {
  LLMMessage,
  LLMRequestOptions,
  LLMResult,
  LLMStreamChunk,
} from '../types/index.js';
import { LLMClient } from '../llm/client.js';

/**
 * Offline client that mirrors its input. Useful for wiring tests and demos.
 */
export class DummyLLMClient extends LLMClient {
  async complete(prompt: string, options?: LLMRequestOptions): Promise<LLMResult> {
    return this.withDeadline(
      async () => ({ text: `[echo] ${prompt}`, raw: { prompt } }),
      options
    );
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResult> {
    const last = messages.length > 0 ? messages[messages.length - 1].content : '';
    return this.withDeadline(
      async () => ({
        text: `[chat-echo] ${last}`,
        raw: { messages: messages.map((m) => m.content) },
      }),
      options
    );
  }

  async *stream(
    messages: LLMMessage[],
    options?: LLMRequestOptions
  ): AsyncGenerator<LLMStreamChunk, void, undefined> {
    const result = await this.chat(messages, options);
    for (const word of result.text.split(/(?<=\s)/)) {
      yield { textDelta: word, raw: {} };
    }
  }
}
