import type { z } from 'zod';

export type ToolName = 'equation_solver' | 'formula_lookup' | 'calculator';

/**
 * Failure categories a tool can report.
 *
 * `InvalidArguments` and `ExecutionError` are produced by the registry; the rest by the tools.
 */
export type ToolErrorKind =
  | 'ParseError'
  | 'NoSolution'
  | 'NotFound'
  | 'EvaluationError'
  | 'InvalidArguments'
  | 'ExecutionError';

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

export type ToolMetadata = Record<string, unknown>;

export type ToolResult<TValue> =
  | { success: true; value: TValue; metadata: ToolMetadata }
  | { success: false; error: ToolError; metadata: ToolMetadata };

/** A deterministic, side-effect-free capability owned by a handler. */
export interface Tool<TArgs, TValue> {
  readonly name: ToolName;
  readonly description: string;
  readonly schema: z.ZodType<TArgs>;
  invoke(args: TArgs): ToolResult<TValue>;
  /** Render a successful value as plain text for prompts and fallbacks. */
  formatValue(value: TValue): string;
}

export function toolSuccess<TValue>(value: TValue, metadata: ToolMetadata = {}): ToolResult<TValue> {
  return { success: true, value, metadata };
}

export function toolFailure<TValue>(
  kind: ToolErrorKind,
  message: string,
  metadata: ToolMetadata = {},
): ToolResult<TValue> {
  return { success: false, error: { kind, message }, metadata };
}
