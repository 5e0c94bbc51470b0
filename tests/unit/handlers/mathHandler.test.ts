import { beforeEach, describe, expect, it } from 'vitest';
import { MathHandler } from '../../../src/core/handlers/mathHandler';
import { createFakeLLM, promptOf, textResponse } from '../../helpers/llm';

describe('MathHandler', () => {
  let fake: ReturnType<typeof createFakeLLM>;
  let handler: MathHandler;

  beforeEach(() => {
    fake = createFakeLLM('fake-model');
    handler = new MathHandler(fake.client);
  });

  it('owns the equation solver and formula lookup', () => {
    expect(handler.key).toBe('math');
    expect(handler.name).toBe('Math Tutor');
    expect(handler.listTools()).toEqual(['equation_solver', 'formula_lookup']);
  });

  it('solves the equation and asks the model to explain the result', async () => {
    fake.chat.mockResolvedValue(textResponse('Subtract 5, then divide by 2: x = 5.'));

    const result = await handler.handle({ text: 'Solve 2x + 5 = 15 for x' });

    expect(result.content).toBe('Subtract 5, then divide by 2: x = 5.');
    expect(result.confidence).toBe(0.85);
    expect(result.sources).toEqual(['Math Tutor', 'fake-model', 'equation_solver']);
    expect(result.metadata).toMatchObject({
      handler: 'Math Tutor',
      handlerKey: 'math',
      toolsUsed: ['equation_solver'],
      toolCallsCount: 1,
    });
    expect(typeof result.metadata.flowId).toBe('string');
    expect(fake.chat).toHaveBeenCalledTimes(1);
    expect(promptOf(fake.chat)).toContain('You used the tool "equation_solver" and got this result: x = 5');
    expect(promptOf(fake.chat)).toContain('1. Explains the mathematical concepts involved');
  });

  it('returns the bare tool answer when the explanation call fails', async () => {
    fake.chat.mockRejectedValue(new Error('model offline'));

    const result = await handler.handle({ text: 'Solve 2x + 5 = 15 for x' });

    expect(result.content).toBe(
      'I found this solution for your math question: x = 5. Let me know if you need further explanation!',
    );
    expect(result.confidence).toBe(0.85);
    expect(result.sources).toEqual(['Math Tutor', 'fake-model', 'equation_solver']);
  });

  it('returns the bare tool answer when the explanation is blank', async () => {
    fake.chat.mockResolvedValue(textResponse('   '));

    const result = await handler.handle({ text: 'Solve 2x + 5 = 15 for x' });

    expect(result.content).toBe(
      'I found this solution for your math question: x = 5. Let me know if you need further explanation!',
    );
    expect(result.confidence).toBe(0.85);
  });

  it('answers with the model when no tool applies', async () => {
    fake.chat.mockResolvedValue(textResponse('A prime has exactly two divisors.'));

    const result = await handler.handle({ text: 'What is a prime number?', context: 'Revision for a quiz' });

    expect(result.content).toBe('A prime has exactly two divisors.');
    expect(result.sources).toEqual(['Math Tutor', 'fake-model']);
    expect(result.metadata).toMatchObject({ toolsUsed: [], toolCallsCount: 0 });

    const request = fake.chat.mock.calls[0][0];
    expect(request.messages[0].role).toBe('system');
    expect(request.messages[0].content.startsWith('You are Math Tutor.')).toBe(true);
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: 'Student Question: What is a prime number?\n\nContext: Revision for a quiz',
    });
  });

  it('falls back to the model when the tool cannot parse the query', async () => {
    fake.chat.mockResolvedValue(textResponse('Which equation do you mean?'));

    const result = await handler.handle({ text: 'Solve this equation please' });

    expect(result.content).toBe('Which equation do you mean?');
    expect(result.metadata).toMatchObject({ toolsUsed: [] });
    expect(fake.chat.mock.calls[0][0].messages[1].content).toBe('Student Question: Solve this equation please');
  });

  it('returns a low-confidence apology when the model fails', async () => {
    fake.chat.mockRejectedValue(new Error('boom'));

    const result = await handler.handle({ text: 'What is a prime number?' });

    expect(result.content).toBe(
      'I encountered an error while trying to help with your math question: boom. Please try rephrasing.',
    );
    expect(result.confidence).toBe(0.1);
    expect(result.metadata).toMatchObject({ handler: 'Math Tutor', error: 'boom' });
  });
});
