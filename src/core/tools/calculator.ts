import { Parser } from 'expr-eval';
import { z } from 'zod';
import { describeError } from '../../shared/errors/app-error';
import { Tool, ToolResult, toolFailure, toolSuccess } from './tool-types';

export interface CalculatorArgs {
  expression: string;
}

const mathParser = new Parser({
  allowMemberAccess: false,
  operators: {
    assignment: false,
  },
});

const REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/\*\*/g, '^'],
  [/√\(/g, 'sqrt('],
  [/\bln\(/g, 'log('],
  [/π/g, 'PI'],
  [/\bpi\b/g, 'PI'],
  [/\be\b/g, 'E'],
];

/** Rewrite common notation into expr-eval syntax. */
export function prepareExpression(expression: string): string {
  return REPLACEMENTS.reduce((expr, [pattern, replacement]) => expr.replace(pattern, replacement), expression.trim());
}

export class CalculatorTool implements Tool<CalculatorArgs, number> {
  readonly name = 'calculator' as const;
  readonly description = 'Perform mathematical calculations including arithmetic, trigonometry, and logarithms';
  readonly schema = z.object({
    expression: z.string().min(1).describe("Expression to evaluate, e.g. '2 + 3 * sin(pi/4)'"),
  });

  invoke({ expression }: CalculatorArgs): ToolResult<number> {
    const prepared = prepareExpression(expression);
    const metadata = { expression: prepared };

    let result: unknown;
    try {
      result = mathParser.evaluate(prepared);
    } catch (error) {
      return toolFailure('EvaluationError', `Calculation error: ${describeError(error)}`, metadata);
    }

    if (typeof result !== 'number' || !Number.isFinite(result)) {
      return toolFailure('EvaluationError', `Calculation error: result is not a finite number (${String(result)})`, metadata);
    }

    return toolSuccess(result, metadata);
  }

  formatValue(value: number): string {
    return String(value);
  }
}
