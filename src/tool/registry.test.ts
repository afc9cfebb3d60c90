// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry } from './registry.js';
import type { Tool, ToolParameter } from './types.js';

function makeTool(name: string, parameters: ReadonlyArray<ToolParameter>): Tool {
  return {
    definition: { name, description: `${name} description`, parameters },
    handler: async () => ({ success: true, output: 'ok' }),
  };
}

describe('ToolRegistry', () => {
  describe('registration', () => {
    it('should register a tool and include it in getDefinitions', () => {
      const registry = createToolRegistry();

      registry.register(
        makeTool('test_tool', [{ name: 'query', type: 'string', description: 'A query string', required: true }]),
      );

      const definitions = registry.getDefinitions();
      expect(definitions.length).toBe(1);
      expect(definitions[0]?.name).toBe('test_tool');
    });

    it('should throw when registering duplicate tool name', () => {
      const registry = createToolRegistry();
      const tool = makeTool('test_tool', []);

      registry.register(tool);

      expect(() => {
        registry.register(tool);
      }).toThrow('tool already registered: test_tool');
    });
  });

  describe('dispatch', () => {
    it('should call handler with valid params and the abort signal', async () => {
      const registry = createToolRegistry();
      const controller = new AbortController();

      let receivedParams: Readonly<Record<string, unknown>> | null = null;
      let receivedSignal: AbortSignal | undefined;

      registry.register({
        definition: {
          name: 'test_tool',
          description: 'A test tool',
          parameters: [{ name: 'input', type: 'string', description: 'An input', required: true }],
        },
        handler: async (params, signal) => {
          receivedParams = params;
          receivedSignal = signal;
          return { success: true, output: 'processed' };
        },
      });

      const result = await registry.dispatch('test_tool', { input: 'hello' }, controller.signal);

      expect(receivedParams).toEqual({ input: 'hello' });
      expect(receivedSignal).toBe(controller.signal);
      expect(result).toEqual({ success: true, output: 'processed' });
    });

    it('should return error for unknown tool', async () => {
      const registry = createToolRegistry();

      const result = await registry.dispatch('unknown_tool', {});

      expect(result).toEqual({ success: false, output: '', error: 'unknown tool: unknown_tool' });
    });

    it('should return error for missing required parameter', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [{ name: 'required_param', type: 'string', description: 'Required', required: true }]),
      );

      const result = await registry.dispatch('test_tool', { required_param: null });

      expect(result.success).toBe(false);
      expect(result.error).toBe('missing required parameter: required_param');
    });

    it('should return error for invalid parameter type', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [{ name: 'count', type: 'integer', description: 'A count', required: true }]),
      );

      const wrongType = await registry.dispatch('test_tool', { count: 'three' });
      const fractional = await registry.dispatch('test_tool', { count: 2.5 });

      expect(wrongType.error).toBe('invalid type for parameter count: expected integer, got string');
      expect(fractional.error).toBe('invalid type for parameter count: expected integer, got number');
    });

    it('should check array items', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          { name: 'tags', type: 'array', items: 'string', description: 'Tags', required: true },
        ]),
      );

      const result = await registry.dispatch('test_tool', { tags: ['a', 7] });

      expect(result.error).toBe('invalid item in parameter tags: expected string, got number');
    });

    it('should accept any of several declared types', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          { name: 'url', type: ['string', 'array'], items: 'string', description: 'URLs', required: true },
        ]),
      );

      const single = await registry.dispatch('test_tool', { url: 'a' });
      const list = await registry.dispatch('test_tool', { url: ['a', 'b'] });
      const wrong = await registry.dispatch('test_tool', { url: 3 });
      const badItem = await registry.dispatch('test_tool', { url: ['a', 3] });

      expect(single.success).toBe(true);
      expect(list.success).toBe(true);
      expect(wrong.error).toBe('invalid type for parameter url: expected string or array, got number');
      expect(badItem.error).toBe('invalid item in parameter url: expected string, got number');
    });

    it('should catch handler errors and wrap in ToolResult', async () => {
      const registry = createToolRegistry();
      registry.register({
        definition: { name: 'test_tool', description: 'A test tool', parameters: [] },
        handler: async () => {
          throw new Error('handler crashed');
        },
      });

      const result = await registry.dispatch('test_tool', {});

      expect(result).toEqual({ success: false, output: '', error: 'handler error: handler crashed' });
    });

    it('should allow optional parameters to be omitted', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          { name: 'required_param', type: 'string', description: 'Required', required: true },
          { name: 'optional_param', type: 'string', description: 'Optional', required: false },
        ]),
      );

      const result = await registry.dispatch('test_tool', { required_param: 'hello' });

      expect(result.success).toBe(true);
    });

    it('should return error for invalid enum value', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          {
            name: 'preset',
            type: 'string',
            description: 'Date preset',
            required: true,
            enum_values: ['past_week', 'past_month'],
          },
        ]),
      );

      const result = await registry.dispatch('test_tool', { preset: 'yesterday' });

      expect(result.success).toBe(false);
      expect(result.error).toBe(
        'invalid value for parameter preset: yesterday (expected one of past_week, past_month)',
      );
    });

    it('should check enum values inside arrays', async () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          {
            name: 'apps',
            type: 'array',
            items: 'string',
            description: 'Applications',
            required: false,
            enum_values: ['wiki', 'blog'],
          },
        ]),
      );

      const valid = await registry.dispatch('test_tool', { apps: ['wiki', 'blog'] });
      const invalid = await registry.dispatch('test_tool', { apps: ['wiki', 'chat'] });

      expect(valid.success).toBe(true);
      expect(invalid.success).toBe(false);
    });
  });

  describe('toModelTools', () => {
    it('should convert tools to JSON Schema', () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          { name: 'query', type: 'string', description: 'Query description', required: true },
          { name: 'limit', type: 'integer', description: 'Limit description', required: false },
          {
            name: 'apps',
            type: 'array',
            items: 'string',
            description: 'Applications',
            required: false,
            enum_values: ['wiki', 'blog'],
          },
        ]),
      );

      expect(registry.toModelTools()).toEqual([
        {
          name: 'test_tool',
          description: 'test_tool description',
          inputSchema: {
            type: 'object',
            properties: {
              query: { type: 'string', description: 'Query description' },
              limit: { type: 'integer', description: 'Limit description' },
              apps: {
                type: 'array',
                description: 'Applications',
                items: { type: 'string', enum: ['wiki', 'blog'] },
              },
            },
            required: ['query'],
          },
        },
      ]);
    });

    it('should include enum values on scalar parameters', () => {
      const registry = createToolRegistry();
      registry.register(
        makeTool('test_tool', [
          { name: 'preset', type: 'string', description: 'Preset', required: true, enum_values: ['a', 'b'] },
        ]),
      );

      const preset = registry.toModelTools()[0]?.inputSchema.properties['preset'];

      expect(preset).toEqual({ type: 'string', description: 'Preset', enum: ['a', 'b'] });
    });

    it('should keep registration order across tools', () => {
      const registry = createToolRegistry();
      registry.register(makeTool('tool1', []));
      registry.register(makeTool('tool2', []));

      expect(registry.toModelTools().map((t) => t.name)).toEqual(['tool1', 'tool2']);
    });
  });
});
