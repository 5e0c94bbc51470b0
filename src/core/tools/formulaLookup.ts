import { z } from 'zod';
import { Tool, ToolResult, toolFailure, toolSuccess } from './tool-types';

export interface FormulaRecord {
  readonly formula: string;
  readonly description: string;
  readonly variables: Readonly<Record<string, string>>;
}

export interface FormulaCandidate {
  key: string;
  description: string;
}

export type FormulaLookupValue =
  | { kind: 'formula'; key: string; record: FormulaRecord }
  | { kind: 'candidates'; candidates: FormulaCandidate[] };

export interface FormulaLookupArgs {
  query: string;
}

export const FORMULA_TABLE: Readonly<Record<string, FormulaRecord>> = Object.freeze({
  quadratic_formula: {
    formula: 'x = (-b ± √(b² - 4ac)) / (2a)',
    description: 'Solve quadratic equations of the form ax² + bx + c = 0',
    variables: { a: 'coefficient of x²', b: 'coefficient of x', c: 'constant term' },
  },
  area_circle: {
    formula: 'A = πr²',
    description: 'Area of a circle',
    variables: { A: 'area', r: 'radius', 'π': 'pi (≈3.14159)' },
  },
  area_triangle: {
    formula: 'A = ½bh',
    description: 'Area of a triangle',
    variables: { A: 'area', b: 'base', h: 'height' },
  },
  pythagorean_theorem: {
    formula: 'a² + b² = c²',
    description: 'Relationship between sides of a right triangle',
    variables: { a: 'first leg', b: 'second leg', c: 'hypotenuse' },
  },
  kinematic_position: {
    formula: 'x = x₀ + v₀t + ½at²',
    description: 'Position as a function of time with constant acceleration',
    variables: { x: 'final position', 'x₀': 'initial position', 'v₀': 'initial velocity', t: 'time', a: 'acceleration' },
  },
  kinematic_velocity: {
    formula: 'v = v₀ + at',
    description: 'Velocity as a function of time with constant acceleration',
    variables: { v: 'final velocity', 'v₀': 'initial velocity', a: 'acceleration', t: 'time' },
  },
  force: {
    formula: 'F = ma',
    description: "Newton's second law of motion",
    variables: { F: 'force (N)', m: 'mass (kg)', a: 'acceleration (m/s²)' },
  },
  kinetic_energy: {
    formula: 'KE = ½mv²',
    description: 'Kinetic energy of a moving object',
    variables: { KE: 'kinetic energy (J)', m: 'mass (kg)', v: 'velocity (m/s)' },
  },
  potential_energy: {
    formula: 'PE = mgh',
    description: 'Gravitational potential energy',
    variables: { PE: 'potential energy (J)', m: 'mass (kg)', g: 'acceleration due to gravity (9.8 m/s²)', h: 'height (m)' },
  },
  ohms_law: {
    formula: 'V = IR',
    description: 'Relationship between voltage, current, and resistance',
    variables: { V: 'voltage (V)', I: 'current (A)', R: 'resistance (Ω)' },
  },
});

export class FormulaLookupTool implements Tool<FormulaLookupArgs, FormulaLookupValue> {
  readonly name = 'formula_lookup' as const;
  readonly description = 'Look up common mathematical and physics formulas by name or concept';
  readonly schema = z.object({
    query: z.string().min(1).describe("Formula name or concept, e.g. 'quadratic formula' or 'kinetic energy'"),
  });

  constructor(private readonly table: Readonly<Record<string, FormulaRecord>> = FORMULA_TABLE) {}

  invoke({ query }: FormulaLookupArgs): ToolResult<FormulaLookupValue> {
    const normalized = query.toLowerCase().trim();

    const direct = this.table[normalized];
    if (direct !== undefined) {
      return toolSuccess<FormulaLookupValue>(
        { kind: 'formula', key: normalized, record: direct },
        { query: normalized, lookupType: 'direct' },
      );
    }

    const matches = this.fuzzySearch(normalized);
    if (matches.length === 0) {
      return toolFailure(
        'NotFound',
        `No formula found for '${normalized}'. Try keywords like 'quadratic', 'circle', 'force', 'energy'.`,
        { query: normalized },
      );
    }

    if (matches.length === 1) {
      const [key] = matches;
      return toolSuccess<FormulaLookupValue>(
        { kind: 'formula', key, record: this.table[key] },
        { query: normalized, lookupType: 'fuzzy', matchedKey: key },
      );
    }

    return toolSuccess<FormulaLookupValue>(
      {
        kind: 'candidates',
        candidates: matches.map((key) => ({ key, description: this.table[key].description })),
      },
      { query: normalized, lookupType: 'multiple_matches' },
    );
  }

  formatValue(value: FormulaLookupValue): string {
    if (value.kind === 'candidates') {
      const lines = value.candidates.map((candidate) => `- ${candidate.key}: ${candidate.description}`);
      return ['Several formulas match:', ...lines].join('\n');
    }

    const variables = Object.entries(value.record.variables)
      .map(([symbol, meaning]) => `${symbol} = ${meaning}`)
      .join(', ');
    return [
      `formula: ${value.record.formula}`,
      `description: ${value.record.description}`,
      `variables: ${variables}`,
    ].join('\n');
  }

  /** Keys whose `key + description` contains any word of the query. */
  private fuzzySearch(query: string): string[] {
    const words = query.split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) return [];

    return Object.entries(this.table)
      .filter(([key, record]) => {
        const searchText = `${key} ${record.description}`.toLowerCase();
        return words.some((word) => searchText.includes(word));
      })
      .map(([key]) => key);
  }
}
