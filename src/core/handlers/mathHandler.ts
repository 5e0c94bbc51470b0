import { LLMClient } from '../llm/llm-types';
import { EquationSolverTool } from '../tools/equationSolver';
import { FormulaLookupTool } from '../tools/formulaLookup';
import { estimateMathConfidence } from './confidence';
import { SpecialistHandler } from './specialistHandler';
import { ToolPlan, planMathTool } from './toolTriggers';

export class MathHandler extends SpecialistHandler {
  constructor(llm: LLMClient) {
    super(
      {
        key: 'math',
        name: 'Math Tutor',
        description: 'Math tutor with expertise in algebra, calculus, statistics, and geometry',
        instruction: `You are a Math Tutor agent. Help students understand mathematical concepts and solve problems.

Use available tools when appropriate:
- equation_solver: Solve linear equations
- formula_lookup: Find mathematical formulas

Provide clear explanations with step-by-step solutions.`,
        subject: 'math',
        conceptAdjective: 'mathematical',
        toolResultNoun: 'solution',
      },
      llm,
    );
    this.tools.register(new EquationSolverTool());
    this.tools.register(new FormulaLookupTool());
  }

  estimateConfidence(text: string): number {
    return estimateMathConfidence(text);
  }

  protected planTool(text: string): ToolPlan | undefined {
    return planMathTool(text);
  }
}
