/**
 * Tool Registry
 *
 * Maps tool names to tool instances and routes invocations by name. Every
 * request and response crosses the tool's zod schemas on the way through.
 */

import type { ToolMetadata } from '../types/index.js';
import type { AnyTool } from './base-tool.js';
import {
  DuplicateToolError,
  SchemaValidationError,
  ToolNotFoundError,
} from '../core/errors.js';

export class ToolRegistry {
  private tools: Map<string, AnyTool> = new Map();

  constructor(tools: Iterable<AnyTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * @throws DuplicateToolError if a tool with the same name is registered
   */
  register(tool: AnyTool): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): void {
    if (!this.tools.delete(name)) {
      throw new ToolNotFoundError(name);
    }
  }

  /**
   * @throws ToolNotFoundError if no tool is registered under `name`
   */
  get(name: string): AnyTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Lazily describe every registered tool. The returned iterable can be
   * walked any number of times and reflects the registry at walk time.
   */
  listMetadata(): Iterable<ToolMetadata> {
    const tools = this.tools;
    return {
      *[Symbol.iterator]() {
        for (const tool of tools.values()) {
          yield {
            name: tool.name,
            description: tool.description,
            requestSchema: tool.requestSchema,
            responseSchema: tool.responseSchema,
          };
        }
      },
    };
  }

  /**
   * Validate `request`, run the tool and validate its response.
   * An invalid request never reaches the tool.
   */
  async invoke(name: string, request: unknown): Promise<unknown> {
    const tool = this.get(name);
    const parsed = this.parseRequest(tool, request);
    const response = await tool.invoke(parsed);
    return this.parseResponse(tool, response);
  }

  /**
   * Streamed form of `invoke`. Yields the tool's partial chunks and returns
   * the validated final response. Tools without a `stream` implementation
   * yield their complete response as the only chunk.
   */
  async *stream(
    name: string,
    request: unknown
  ): AsyncGenerator<unknown, unknown, undefined> {
    const tool = this.get(name);
    const parsed = this.parseRequest(tool, request);

    if (!tool.stream) {
      const response = this.parseResponse(tool, await tool.invoke(parsed));
      yield response;
      return response;
    }

    const iterator = tool.stream(parsed);
    let next = await iterator.next();
    while (!next.done) {
      yield next.value;
      next = await iterator.next();
    }
    return this.parseResponse(tool, next.value);
  }

  private parseRequest(tool: AnyTool, request: unknown): unknown {
    const result = tool.requestSchema.safeParse(request);
    if (!result.success) {
      throw new SchemaValidationError(tool.name, 'request', result.error.issues);
    }
    return result.data;
  }

  private parseResponse(tool: AnyTool, response: unknown): unknown {
    const result = tool.responseSchema.safeParse(response);
    if (!result.success) {
      throw new SchemaValidationError(tool.name, 'response', result.error.issues);
    }
    return result.data;
  }
}
