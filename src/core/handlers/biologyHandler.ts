import { LLMClient } from '../llm/llm-types';
import { BIOLOGY_CONFIDENCE, estimateTwoTierConfidence } from './confidence';
import { SpecialistHandler } from './specialistHandler';

/** Answers from the model alone; owns no tools. */
export class BiologyHandler extends SpecialistHandler {
  constructor(llm: LLMClient) {
    super(
      {
        key: 'biology',
        name: 'Biology Tutor',
        description: 'Biology tutor with expertise in cellular biology, genetics, ecology, and human physiology',
        instruction: `You are a Biology Tutor agent. Help students understand biological concepts and processes.

Provide clear explanations with relevant examples and analogies.
Focus on accuracy and educational value in your responses.`,
        subject: 'biology',
        conceptAdjective: 'biological',
        toolResultNoun: 'answer',
      },
      llm,
    );
  }

  estimateConfidence(text: string): number {
    return estimateTwoTierConfidence(text, BIOLOGY_CONFIDENCE);
  }
}
