import { z } from 'zod';
import { BaseTool } from '../../src/tools/base-tool.js';

const DoubleRequestSchema = z.object({ value: z.number() });
const DoubleResponseSchema = z.object({ result: z.number().int() });

/**
 * Doubles `value` and remembers every value it was called with
 */
export class DoublingTool extends BaseTool<
  typeof DoubleRequestSchema,
  typeof DoubleResponseSchema
> {
  readonly name = 'double';
  readonly requestSchema = DoubleRequestSchema;
  readonly responseSchema = DoubleResponseSchema;
  readonly calls: number[] = [];

  invoke({ value }: { value: number }): { result: number } {
    this.calls.push(value);
    return { result: value * 2 };
  }
}

const TextSchema = z.object({ text: z.string() });

/**
 * Resolves only once `gate.open()` has been called
 */
export class GatedTool extends BaseTool<typeof TextSchema, typeof TextSchema> {
  readonly name = 'gated';
  readonly requestSchema = TextSchema;
  readonly responseSchema = TextSchema;
  readonly gate = createGate();

  async invoke(request: { text: string }): Promise<{ text: string }> {
    await this.gate.promise;
    return { text: request.text };
  }
}

export class FailingTool extends BaseTool<typeof TextSchema, typeof TextSchema> {
  readonly name = 'failing';
  readonly requestSchema = TextSchema;
  readonly responseSchema = TextSchema;

  invoke(): { text: string } {
    throw new Error('boom');
  }
}

export function createGate(): { promise: Promise<void>; open: () => void } {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, open: () => release() };
}
