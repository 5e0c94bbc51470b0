import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { CalculatorTool } from '../../../src/core/tools/calculator';
import { EquationSolverTool } from '../../../src/core/tools/equationSolver';
import { Tool } from '../../../src/core/tools/tool-types';
import { ToolRegistry } from '../../../src/core/tools/toolRegistry';

function createRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new CalculatorTool());
  registry.register(new EquationSolverTool());
  return registry;
}

describe('ToolRegistry', () => {
  it('lists registered tools in registration order', () => {
    const registry = createRegistry();
    expect(registry.listNames()).toEqual(['calculator', 'equation_solver']);
    expect(registry.has('formula_lookup')).toBe(false);
    expect(registry.get('calculator')?.name).toBe('calculator');
  });

  it('throws on duplicate registration', () => {
    const registry = createRegistry();
    expect(() => registry.register(new CalculatorTool())).toThrow('Tool "calculator" is already registered');
  });

  it('runs a valid call and renders the value', () => {
    const run = createRegistry().executeValidated({ name: 'calculator', args: { expression: '1 + 1' } });
    expect(run).toEqual({
      success: true,
      toolName: 'calculator',
      value: 2,
      display: '2',
      metadata: { expression: '1 + 1' },
    });
  });

  it('passes tool-reported failures through unchanged', () => {
    const run = createRegistry().executeValidated({ name: 'equation_solver', args: { equation: 'x + 1' } });
    expect(run).toEqual({
      success: false,
      toolName: 'equation_solver',
      error: { kind: 'ParseError', message: 'Equation must contain an equals sign' },
      metadata: { equation: 'x+1', variable: 'x' },
    });
  });

  it('maps schema violations to InvalidArguments', () => {
    const run = createRegistry().executeValidated({ name: 'calculator', args: { expression: 5 } });
    expect(run.success).toBe(false);
    if (!run.success) {
      expect(run.error.kind).toBe('InvalidArguments');
      expect(run.error.message).toContain('Invalid arguments for tool "calculator": expression:');
    }
  });

  it('rejects calls to tools it does not own', () => {
    const run = new ToolRegistry().executeValidated({ name: 'calculator', args: { expression: '1' } });
    expect(run).toMatchObject({
      success: false,
      error: { kind: 'InvalidArguments', message: 'Unknown tool: "calculator". Allowed tools: none' },
    });
  });

  it('rejects oversized and non-serializable arguments', () => {
    const registry = createRegistry();
    expect(registry.validateToolCall({ name: 'calculator', args: { expression: 'x'.repeat(11_000) } })).toEqual({
      success: false,
      error: 'Tool arguments exceed maximum size (11017 > 10240 bytes)',
    });
    expect(registry.validateToolCall({ name: 'calculator', args: { expression: 1n } })).toEqual({
      success: false,
      error: 'Tool arguments for "calculator" must be JSON-serializable',
    });
  });

  it('maps a thrown error to ExecutionError', () => {
    const exploding: Tool<{ expression: string }, number> = {
      name: 'calculator',
      description: 'always throws',
      schema: z.object({ expression: z.string() }),
      invoke: () => {
        throw new Error('kaboom');
      },
      formatValue: String,
    };
    const registry = new ToolRegistry();
    registry.register(exploding);

    expect(registry.executeValidated({ name: 'calculator', args: { expression: '1' } })).toEqual({
      success: false,
      toolName: 'calculator',
      error: { kind: 'ExecutionError', message: 'Tool execution failed: kaboom' },
      metadata: {},
    });
  });
});
