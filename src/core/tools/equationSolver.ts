import { z } from 'zod';
import { Tool, ToolResult, toolFailure, toolSuccess } from './tool-types';

const EPSILON = 1e-10;
const ROUND_DIGITS = 6;

const X_TERM_PATTERN = /^(-?)(\d+(?:\.\d+)?|\.\d+)?\*?x$/;
const CONSTANT_PATTERN = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

export type EquationSolution = { kind: 'unique'; x: number } | { kind: 'infinite' };

export interface EquationSolverArgs {
  equation: string;
}

/** Linear form `coefficient * x + constant` for one side of an equation. */
interface LinearSide {
  coefficient: number;
  constant: number;
}

class EquationParseError extends Error {}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Parse one side of a linear equation in `x`.
 *
 * Accepted terms: `c`, `cx`, `c*x`, `x`, `-x`, joined by `+` or `-`.
 */
export function parseLinearSide(side: string): LinearSide {
  if (side.length === 0) {
    throw new EquationParseError('Both sides of the equation must contain a term');
  }

  const terms = side
    .replace(/-/g, '+-')
    .split('+')
    .filter((term) => term.length > 0);

  if (terms.length === 0) {
    throw new EquationParseError(`No terms found in "${side}"`);
  }

  let coefficient = 0;
  let constant = 0;

  for (const term of terms) {
    const xMatch = X_TERM_PATTERN.exec(term);
    if (xMatch) {
      const magnitude = xMatch[2] === undefined ? 1 : Number(xMatch[2]);
      coefficient += xMatch[1] === '-' ? -magnitude : magnitude;
      continue;
    }
    if (CONSTANT_PATTERN.test(term)) {
      constant += Number(term);
      continue;
    }
    throw new EquationParseError(`Unsupported term "${term}"`);
  }

  return { coefficient, constant };
}

export class EquationSolverTool implements Tool<EquationSolverArgs, EquationSolution> {
  readonly name = 'equation_solver' as const;
  readonly description = "Solve linear equations in x such as 'x + 5 = 10' or '2x - 3 = 7'";
  readonly schema = z.object({
    equation: z.string().min(1).describe("Linear equation to solve, e.g. '2x + 3 = 7'"),
  });

  invoke({ equation }: EquationSolverArgs): ToolResult<EquationSolution> {
    const normalized = equation.replace(/\s+/g, '').toLowerCase();
    const metadata = { equation: normalized, variable: 'x' };

    const sides = normalized.split('=');
    if (sides.length !== 2) {
      return toolFailure(
        'ParseError',
        sides.length < 2 ? 'Equation must contain an equals sign' : 'Equation must contain exactly one equals sign',
        metadata,
      );
    }

    let left: LinearSide;
    let right: LinearSide;
    try {
      left = parseLinearSide(sides[0]);
      right = parseLinearSide(sides[1]);
    } catch (error) {
      if (error instanceof EquationParseError) {
        return toolFailure('ParseError', error.message, metadata);
      }
      throw error;
    }

    const a = left.coefficient - right.coefficient;
    const b = right.constant - left.constant;

    if (Math.abs(a) < EPSILON) {
      if (Math.abs(b) < EPSILON) {
        return toolSuccess<EquationSolution>({ kind: 'infinite' }, metadata);
      }
      return toolFailure('NoSolution', 'The equation has no solution', metadata);
    }

    return toolSuccess<EquationSolution>({ kind: 'unique', x: roundTo(b / a, ROUND_DIGITS) }, metadata);
  }

  formatValue(value: EquationSolution): string {
    return value.kind === 'unique' ? `x = ${value.x}` : 'infinite solutions (every x satisfies the equation)';
  }
}
