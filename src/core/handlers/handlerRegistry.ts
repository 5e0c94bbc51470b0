import { LLMClient } from '../llm/llm-types';
import { BiologyHandler } from './biologyHandler';
import { Handler, HandlerSummary, SpecialistKey } from './handler-types';
import { MathHandler } from './mathHandler';
import { PhysicsHandler } from './physicsHandler';

export const DEFAULT_ROUTING_THRESHOLD = 0.3;

export type HandlerFactory = (llm: LLMClient) => Handler;

/** Registration order decides ties in `findBest`. */
export const HANDLER_TABLE: ReadonlyArray<readonly [SpecialistKey, HandlerFactory]> = [
  ['math', (llm) => new MathHandler(llm)],
  ['physics', (llm) => new PhysicsHandler(llm)],
  ['biology', (llm) => new BiologyHandler(llm)],
];

export interface RoutedHandler {
  key: string;
  handler: Handler;
  confidence: number;
}

export interface HandlerRegistryOptions {
  table?: ReadonlyArray<readonly [string, HandlerFactory]>;
  /** Minimum score `routeQuery` accepts when the caller gives none. */
  threshold?: number;
}

export class HandlerRegistry {
  private readonly handlers = new Map<string, Handler>();
  private readonly threshold: number;

  constructor(llm: LLMClient, opts: HandlerRegistryOptions = {}) {
    this.threshold = opts.threshold ?? DEFAULT_ROUTING_THRESHOLD;
    for (const [key, create] of opts.table ?? HANDLER_TABLE) {
      if (this.handlers.has(key)) {
        throw new Error(`Handler "${key}" is already registered`);
      }
      this.handlers.set(key, create(llm));
    }
  }

  get(key: string): Handler | undefined {
    return this.handlers.get(key);
  }

  list(): HandlerSummary[] {
    return Array.from(this.handlers.entries()).map(([key, handler]) => ({
      key,
      name: handler.name,
      description: handler.description,
      tools: handler.listTools(),
    }));
  }

  /** Highest-scoring handler at or above `threshold`; the earlier registration wins a tie. */
  routeQuery(text: string, threshold = this.threshold): RoutedHandler | undefined {
    let best: RoutedHandler | undefined;
    for (const [key, handler] of this.handlers) {
      const confidence = handler.estimateConfidence(text);
      if (confidence < threshold) continue;
      if (!best || confidence > best.confidence) {
        best = { key, handler, confidence };
      }
    }
    return best;
  }

  findBest(text: string, threshold = this.threshold): Handler | undefined {
    return this.routeQuery(text, threshold)?.handler;
  }
}
