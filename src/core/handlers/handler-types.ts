import type { ToolName } from '../tools/tool-types';

export type SpecialistKey = 'math' | 'physics' | 'biology';

export interface Query {
  readonly text: string;
  /** Prior conversation or caller-supplied background, already rendered as text. */
  readonly context?: string;
  readonly userId?: string;
  readonly sessionId?: string;
}

export interface HandlerResult {
  readonly content: string;
  /** In [0, 1]. */
  readonly confidence: number;
  readonly sources: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly executionTimeMs: number;
}

export interface Handler {
  readonly key: string;
  readonly name: string;
  readonly description: string;
  /** Pure heuristic over the query text; always in [0, 1]. */
  estimateConfidence(text: string): number;
  /** Never rejects: every failure is folded into a low-confidence result. */
  handle(query: Query): Promise<HandlerResult>;
  listTools(): ToolName[];
}

export interface HandlerSummary {
  key: string;
  name: string;
  description: string;
  tools: ToolName[];
}
