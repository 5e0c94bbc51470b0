import { LLMClient } from '../llm/llm-types';
import { FormulaLookupTool } from '../tools/formulaLookup';
import { PHYSICS_CONFIDENCE, estimateTwoTierConfidence } from './confidence';
import { SpecialistHandler } from './specialistHandler';
import { ToolPlan, planPhysicsTool } from './toolTriggers';

export class PhysicsHandler extends SpecialistHandler {
  constructor(llm: LLMClient) {
    super(
      {
        key: 'physics',
        name: 'Physics Tutor',
        description: 'Physics tutor with expertise in mechanics, electromagnetism, thermodynamics, and modern physics',
        instruction: `You are a Physics Tutor agent. Help students understand physics concepts and solve problems.

Use available tools when appropriate:
- formula_lookup: Find physics formulas and equations

Provide clear explanations with step-by-step solutions.`,
        subject: 'physics',
        conceptAdjective: 'physics',
        toolResultNoun: 'formula',
      },
      llm,
    );
    this.tools.register(new FormulaLookupTool());
  }

  estimateConfidence(text: string): number {
    return estimateTwoTierConfidence(text, PHYSICS_CONFIDENCE);
  }

  protected planTool(text: string): ToolPlan | undefined {
    return planPhysicsTool(text);
  }
}
