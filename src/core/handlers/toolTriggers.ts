import type { ToolName } from '../tools/tool-types';

/** A deterministic tool call chosen from the query text before any model is involved. */
export interface ToolPlan {
  tool: ToolName;
  args: Record<string, string>;
}

const EQUATION_TRIGGERS = ['solve', 'equation', 'find x', 'find the value'];
const MATH_FORMULA_TRIGGERS = ['formula'];
const PHYSICS_FORMULA_TRIGGERS = ['formula', 'equation', 'law of'];

const EQUATION_RUN = /[-+*.\dx\s]+=[-+*.\dx\s]+/;

function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term));
}

/** The first run of digits, `x`, operators and spaces around an `=`; the whole text when there is none. */
export function extractEquation(text: string): string {
  const lower = text.toLowerCase();
  const match = EQUATION_RUN.exec(lower);
  return match ? match[0].trim() : lower.trim();
}

export function mathFormulaKey(lower: string): string {
  if (lower.includes('quadratic')) return 'quadratic_formula';
  if (lower.includes('pythagorean')) return 'pythagorean_theorem';
  if (lower.includes('area') && lower.includes('circle')) return 'area_circle';
  if (lower.includes('area') && lower.includes('triangle')) return 'area_triangle';
  return lower;
}

export function physicsFormulaKey(lower: string): string {
  if (lower.includes('kinetic energy')) return 'kinetic_energy';
  if (lower.includes('potential energy')) return 'potential_energy';
  if (lower.includes('force') && (lower.includes('newton') || lower.includes('second law'))) return 'force';
  if (lower.includes('ohm') || lower.includes('voltage')) return 'ohms_law';
  return lower;
}

export function planMathTool(text: string): ToolPlan | undefined {
  const lower = text.toLowerCase();
  if (containsAny(lower, EQUATION_TRIGGERS)) {
    return { tool: 'equation_solver', args: { equation: extractEquation(text) } };
  }
  if (containsAny(lower, MATH_FORMULA_TRIGGERS)) {
    return { tool: 'formula_lookup', args: { query: mathFormulaKey(lower) } };
  }
  return undefined;
}

export function planPhysicsTool(text: string): ToolPlan | undefined {
  const lower = text.toLowerCase();
  if (containsAny(lower, PHYSICS_FORMULA_TRIGGERS)) {
    return { tool: 'formula_lookup', args: { query: physicsFormulaKey(lower) } };
  }
  return undefined;
}
