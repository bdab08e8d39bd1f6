import type { z, ZodTypeAny } from 'zod';

/**
 * Abstract interface that every concrete tool implements.
 *
 * Schemas are zod schemas: the registry parses requests with `requestSchema`
 * before `invoke` runs and parses whatever `invoke` returns with
 * `responseSchema`, so implementations can trust their input types.
 *
 * ```typescript
 * class UpperTool extends BaseTool<typeof Req, typeof Res> {
 *   readonly name = 'upper';
 *   readonly requestSchema = Req;
 *   readonly responseSchema = Res;
 *   invoke({ text }: { text: string }) {
 *     return { text: text.toUpperCase() };
 *   }
 * }
 * ```
 */
export abstract class BaseTool<
  TRequest extends ZodTypeAny = ZodTypeAny,
  TResponse extends ZodTypeAny = ZodTypeAny,
> {
  /** Unique identifier within a registry */
  abstract readonly name: string;
  abstract readonly requestSchema: TRequest;
  abstract readonly responseSchema: TResponse;

  /**
   * Human readable description used by agents when choosing a tool
   */
  get description(): string {
    return this.name;
  }

  abstract invoke(
    request: z.output<TRequest>
  ): Promise<z.input<TResponse>> | z.input<TResponse>;

  /**
   * Optional incremental form of `invoke`: yields partial chunks in
   * generation order and returns the complete response.
   */
  stream?(
    request: z.output<TRequest>
  ): AsyncGenerator<unknown, z.input<TResponse>, undefined>;
}

export type AnyTool = BaseTool<ZodTypeAny, ZodTypeAny>;
