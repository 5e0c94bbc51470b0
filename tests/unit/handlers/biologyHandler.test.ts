import { describe, expect, it } from 'vitest';
import { BiologyHandler } from '../../../src/core/handlers/biologyHandler';
import { createFakeLLM, textResponse } from '../../helpers/llm';

describe('BiologyHandler', () => {
  it('has no tools', () => {
    expect(new BiologyHandler(createFakeLLM().client).listTools()).toEqual([]);
  });

  it('scores genetics questions higher than unrelated ones', () => {
    const handler = new BiologyHandler(createFakeLLM().client);
    expect(handler.estimateConfidence('How do enzymes speed up reactions?')).toBeCloseTo(0.7, 10);
    expect(handler.estimateConfidence('What is the capital of Peru?')).toBe(0.2);
  });

  it('answers through the model even when the text mentions a formula', async () => {
    const fake = createFakeLLM('fake-model');
    fake.chat.mockResolvedValue(textResponse('Photosynthesis turns light into sugar.'));
    const handler = new BiologyHandler(fake.client);

    const result = await handler.handle({ text: 'Give me the formula for photosynthesis' });

    expect(result.content).toBe('Photosynthesis turns light into sugar.');
    expect(result.sources).toEqual(['Biology Tutor', 'fake-model']);
    expect(result.metadata).toMatchObject({ handlerKey: 'biology', toolsUsed: [], toolCallsCount: 0 });
  });

  it('apologizes with low confidence when the model reply is blank', async () => {
    const fake = createFakeLLM('fake-model');
    fake.chat.mockResolvedValue(textResponse(''));
    const handler = new BiologyHandler(fake.client);

    const result = await handler.handle({ text: 'What is mitosis?' });

    expect(result.content).toBe(
      'I encountered an error while trying to help with your biology question: Model returned an empty response. Please try rephrasing.',
    );
    expect(result.confidence).toBe(0.1);
    expect(result.sources).toEqual(['Biology Tutor']);
    expect(result.metadata).toMatchObject({ error: 'Model returned an empty response' });
  });
});
