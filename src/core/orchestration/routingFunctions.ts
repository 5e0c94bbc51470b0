import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { LLMFunctionTool } from '../llm/llm-types';

export type RoutingFunctionName = 'route_to_math_handler' | 'route_to_physics_handler' | 'handle_general_query';

export type RoutingDecision =
  | { action: 'delegate'; handlerKey: string; reasoning: string; source: 'model' | 'fallback' }
  | { action: 'handle_directly'; reasoning: string; source: 'model' | 'fallback' };

/** Where each routing function sends the query; `undefined` means the coordinator answers itself. */
export const ROUTING_TARGETS: Readonly<Record<RoutingFunctionName, string | undefined>> = {
  route_to_math_handler: 'math',
  route_to_physics_handler: 'physics',
  handle_general_query: undefined,
};

export const routingArgsSchema = z.object({
  query: z.string().describe('The student query being routed'),
  reasoning: z.string().describe('Brief explanation of why this route was chosen'),
});

export type RoutingArgs = z.infer<typeof routingArgsSchema>;

const ROUTING_FUNCTION_DESCRIPTIONS: Record<RoutingFunctionName, string> = {
  route_to_math_handler:
    'Route the query to the Math Tutor for mathematical problems including algebra, geometry, calculus, arithmetic, and general math questions.',
  route_to_physics_handler:
    'Route the query to the Physics Tutor for physics problems including mechanics, electricity, magnetism, thermodynamics, forces, energy, and general physics concepts.',
  handle_general_query:
    'Handle the query directly as a general tutor for non-specialized topics like history, literature, general knowledge, or mixed subjects.',
};

export function isRoutingFunctionName(name: string): name is RoutingFunctionName {
  return Object.prototype.hasOwnProperty.call(ROUTING_TARGETS, name);
}

export function buildRoutingTools(): LLMFunctionTool[] {
  const parameters = zodToJsonSchema(routingArgsSchema, { $refStrategy: 'none' });
  return Object.entries(ROUTING_FUNCTION_DESCRIPTIONS).map(([name, description]) => ({
    type: 'function' as const,
    function: { name, description, parameters },
  }));
}

export const ROUTING_SYSTEM_PROMPT = `You are a Tutor Coordinator responsible for routing student queries to the most appropriate specialist or handling them directly.

Decide whether each query should be:
1. Routed to the Math Tutor (mathematical problems, equations, concepts)
2. Routed to the Physics Tutor (physics concepts, principles, problems)
3. Handled directly as a general tutor (other subjects or mixed topics)

Guidelines:
- Math Tutor: algebra, geometry, calculus, arithmetic and mathematical concepts.
- Physics Tutor: mechanics, electricity, magnetism, thermodynamics, forces, energy, motion, waves and optics.
- General handling: history, literature, chemistry, social sciences, queries spanning several subjects, or when unsure.

Always call exactly one function and give your reasoning. Every query must be routed.`;

/** Keyword sets for routing when the model gives no usable decision. Kept apart from the handlers' own lists. */
export const FALLBACK_ROUTES: ReadonlyArray<{ handlerKey: string; label: string; keywords: readonly string[] }> = [
  { handlerKey: 'math', label: 'math', keywords: ['math', 'equation', 'algebra', 'calculate'] },
  { handlerKey: 'physics', label: 'physics', keywords: ['physics', 'force', 'energy', 'motion'] },
];

export function fallbackDecision(text: string, cause: string): RoutingDecision {
  const lower = text.toLowerCase();
  for (const route of FALLBACK_ROUTES) {
    if (route.keywords.some((keyword) => lower.includes(keyword))) {
      return {
        action: 'delegate',
        handlerKey: route.handlerKey,
        reasoning: `Fallback (${cause}) - ${route.label} keywords detected.`,
        source: 'fallback',
      };
    }
  }
  return {
    action: 'handle_directly',
    reasoning: `Fallback (${cause}) - no specific keywords.`,
    source: 'fallback',
  };
}
