import { describe, expect, it, vi } from 'vitest';
import { Handler } from '../../../src/core/handlers/handler-types';
import { HandlerRegistry } from '../../../src/core/handlers/handlerRegistry';
import { createFakeLLM } from '../../helpers/llm';

function stubHandler(name: string, confidence: number): Handler {
  return {
    key: name.toLowerCase(),
    name,
    description: `${name} stub`,
    estimateConfidence: () => confidence,
    handle: vi.fn(),
    listTools: () => [],
  };
}

describe('HandlerRegistry', () => {
  const registry = new HandlerRegistry(createFakeLLM().client);

  it('builds the three specialists in table order', () => {
    expect(registry.list()).toEqual([
      {
        key: 'math',
        name: 'Math Tutor',
        description: 'Math tutor with expertise in algebra, calculus, statistics, and geometry',
        tools: ['equation_solver', 'formula_lookup'],
      },
      {
        key: 'physics',
        name: 'Physics Tutor',
        description: 'Physics tutor with expertise in mechanics, electromagnetism, thermodynamics, and modern physics',
        tools: ['formula_lookup'],
      },
      {
        key: 'biology',
        name: 'Biology Tutor',
        description: 'Biology tutor with expertise in cellular biology, genetics, ecology, and human physiology',
        tools: [],
      },
    ]);
  });

  it('returns undefined for unknown keys', () => {
    expect(registry.get('chemistry')).toBeUndefined();
    expect(registry.get('physics')?.name).toBe('Physics Tutor');
  });

  it('picks the best-scoring specialist', () => {
    expect(registry.findBest('Solve 2x + 5 = 15 for x')?.key).toBe('math');
    expect(registry.findBest('What formula describes kinetic energy?')?.key).toBe('physics');
    expect(registry.findBest('How does DNA replication work?')?.key).toBe('biology');
  });

  it('returns undefined when nothing reaches the threshold', () => {
    expect(registry.findBest('hello there')).toBeUndefined();
    expect(registry.routeQuery('hello there', 0.2)).toMatchObject({ key: 'physics', confidence: 0.2 });
  });

  it('reports the winning score', () => {
    expect(registry.routeQuery('What formula describes kinetic energy?')).toMatchObject({ key: 'physics' });
    expect(registry.routeQuery('What formula describes kinetic energy?')?.confidence).toBeCloseTo(0.7, 10);
  });

  it('keeps the earlier registration on a tie', () => {
    const tied = new HandlerRegistry(createFakeLLM().client, {
      table: [
        ['first', () => stubHandler('First', 0.6)],
        ['second', () => stubHandler('Second', 0.6)],
      ],
    });
    expect(tied.findBest('anything')?.name).toBe('First');
  });

  it('uses the configured threshold as the default', () => {
    const strict = new HandlerRegistry(createFakeLLM().client, {
      table: [['only', () => stubHandler('Only', 0.5)]],
      threshold: 0.6,
    });
    expect(strict.findBest('anything')).toBeUndefined();
    expect(strict.findBest('anything', 0.5)?.name).toBe('Only');
  });

  it('rejects duplicate keys', () => {
    expect(
      () =>
        new HandlerRegistry(createFakeLLM().client, {
          table: [
            ['dup', () => stubHandler('A', 0)],
            ['dup', () => stubHandler('B', 0)],
          ],
        }),
    ).toThrow('Handler "dup" is already registered');
  });
});
