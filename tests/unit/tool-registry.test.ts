import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from '../../src/tools/tool-registry.js';
import { EchoTool } from '../../src/demo/echo-tool.js';
import {
  DuplicateToolError,
  SchemaValidationError,
  ToolNotFoundError,
} from '../../src/core/errors.js';
import { DoublingTool } from '../fixtures/tools.js';

async function drain(
  stream: AsyncGenerator<unknown, unknown, undefined>
): Promise<{ chunks: unknown[]; result: unknown }> {
  const chunks: unknown[] = [];
  let next = await stream.next();
  while (!next.done) {
    chunks.push(next.value);
    next = await stream.next();
  }
  return { chunks, result: next.value };
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  describe('register', () => {
    it('should reject a second tool with the same name', () => {
      const first = new DoublingTool();
      registry.register(first);

      expect(() => registry.register(new DoublingTool())).toThrow(DuplicateToolError);
      expect(registry.get('double')).toBe(first);
      expect(registry.size).toBe(1);
    });

    it('should register tools passed to the constructor', () => {
      const seeded = new ToolRegistry([new EchoTool(), new DoublingTool()]);

      expect(seeded.names()).toEqual(['echo', 'double']);
    });
  });

  describe('get', () => {
    it('should return the exact registered instance', () => {
      const tool = new EchoTool();
      registry.register(tool);

      expect(registry.get('echo')).toBe(tool);
    });

    it('should throw ToolNotFoundError for unknown names', () => {
      expect(() => registry.get('missing')).toThrow(ToolNotFoundError);
    });
  });

  describe('unregister', () => {
    it('should remove the tool', () => {
      registry.register(new EchoTool());
      registry.unregister('echo');

      expect(registry.has('echo')).toBe(false);
    });

    it('should throw ToolNotFoundError for unknown names', () => {
      expect(() => registry.unregister('missing')).toThrow(ToolNotFoundError);
    });
  });

  describe('listMetadata', () => {
    it('should list a registered tool exactly once', () => {
      const tool = new EchoTool();
      registry.register(tool);
      registry.register(new DoublingTool());

      const echoEntries = [...registry.listMetadata()].filter((m) => m.name === 'echo');

      expect(echoEntries).toHaveLength(1);
      expect(echoEntries[0].description).toBe('Echo the given text back unchanged.');
      expect(echoEntries[0].requestSchema).toBe(tool.requestSchema);
      expect(echoEntries[0].responseSchema).toBe(tool.responseSchema);
    });

    it('should be restartable', () => {
      registry.register(new EchoTool());
      const metadata = registry.listMetadata();

      expect([...metadata].map((m) => m.name)).toEqual(['echo']);
      expect([...metadata].map((m) => m.name)).toEqual(['echo']);
    });

    it('should read the registry lazily', () => {
      const metadata = registry.listMetadata();
      registry.register(new DoublingTool());

      expect([...metadata].map((m) => m.name)).toEqual(['double']);
    });

    it('should default the description to the tool name', () => {
      registry.register(new DoublingTool());

      expect([...registry.listMetadata()][0].description).toBe('double');
    });
  });

  describe('invoke', () => {
    it('should echo the text field', async () => {
      registry.register(new EchoTool());

      await expect(registry.invoke('echo', { text: 'hi' })).resolves.toEqual({ text: 'hi' });
    });

    it('should strip fields the request schema does not declare', async () => {
      registry.register(new EchoTool());

      await expect(
        registry.invoke('echo', { text: 'hi', volume: 11 })
      ).resolves.toEqual({ text: 'hi' });
    });

    it('should reject an invalid request without calling the tool', async () => {
      const tool = new DoublingTool();
      registry.register(tool);

      const error = await registry.invoke('double', { value: 'three' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error).toMatchObject({ toolName: 'double', direction: 'request' });
      expect(tool.calls).toEqual([]);
    });

    it('should reject a response that breaks the response schema', async () => {
      const tool = new DoublingTool();
      registry.register(tool);

      const error = await registry.invoke('double', { value: 1.25 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error).toMatchObject({ direction: 'response' });
      expect(tool.calls).toEqual([1.25]);
    });

    it('should throw ToolNotFoundError for unknown tools', async () => {
      await expect(registry.invoke('missing', {})).rejects.toThrow(ToolNotFoundError);
    });
  });

  describe('stream', () => {
    it('should yield partial chunks and return the final response', async () => {
      registry.register(new EchoTool());

      const { chunks, result } = await drain(registry.stream('echo', { text: 'hello big world' }));

      expect(chunks).toEqual(['hello ', 'big ', 'world']);
      expect(result).toEqual({ text: 'hello big world' });
    });

    it('should yield the whole response once for tools that do not stream', async () => {
      registry.register(new DoublingTool());

      const { chunks, result } = await drain(registry.stream('double', { value: 4 }));

      expect(chunks).toEqual([{ result: 8 }]);
      expect(result).toEqual({ result: 8 });
    });

    it('should validate the request before streaming', async () => {
      registry.register(new EchoTool());

      await expect(drain(registry.stream('echo', { text: 42 }))).rejects.toThrow(
        SchemaValidationError
      );
    });
  });
});
