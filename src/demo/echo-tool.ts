import { z } from 'zod';
import { BaseTool } from '../tools/base-tool.js';

const EchoRequestSchema = z.object({
  text: z.string(),
});

const EchoResponseSchema = z.object({
  text: z.string(),
});

export type EchoRequest = z.infer<typeof EchoRequestSchema>;
export type EchoResponse = z.infer<typeof EchoResponseSchema>;

/**
 * Echoes its `text` field back to the caller. Streams word by word.
 */
export class EchoTool extends BaseTool<
  typeof EchoRequestSchema,
  typeof EchoResponseSchema
> {
  readonly name = 'echo';
  readonly requestSchema = EchoRequestSchema;
  readonly responseSchema = EchoResponseSchema;

  get description(): string {
    return 'Echo the given text back unchanged.';
  }

  invoke(request: EchoRequest): EchoResponse {
    return { text: request.text };
  }

  async *stream(request: EchoRequest): AsyncGenerator<string, EchoResponse, undefined> {
    for (const word of request.text.split(/(?<=\s)/)) {
      yield word;
    }
    return { text: request.text };
  }
}
