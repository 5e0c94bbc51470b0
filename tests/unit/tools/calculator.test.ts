import { describe, expect, it } from 'vitest';
import { CalculatorTool, prepareExpression } from '../../../src/core/tools/calculator';

const calculator = new CalculatorTool();

function value(expression: string): number | undefined {
  const result = calculator.invoke({ expression });
  return result.success ? result.value : undefined;
}

describe('prepareExpression', () => {
  it('rewrites common notation', () => {
    expect(prepareExpression('2 ** pi')).toBe('2 ^ PI');
    expect(prepareExpression('√(9) + ln(e)')).toBe('sqrt(9) + log(E)');
    expect(prepareExpression('π * 2')).toBe('PI * 2');
  });

  it('leaves names containing e alone', () => {
    expect(prepareExpression('exp(1) + sec')).toBe('exp(1) + sec');
  });
});

describe('CalculatorTool', () => {
  it('evaluates arithmetic with precedence', () => {
    expect(value('2 + 3 * 4')).toBe(14);
    expect(value('2 ** 3')).toBe(8);
  });

  it('evaluates functions and constants', () => {
    expect(value('sqrt(16)')).toBe(4);
    expect(value('sin(pi / 2)')).toBeCloseTo(1, 10);
    expect(value('ln(e)')).toBeCloseTo(1, 10);
  });

  it('records the prepared expression', () => {
    expect(calculator.invoke({ expression: ' 2 ** 2 ' })).toEqual({
      success: true,
      value: 4,
      metadata: { expression: '2 ^ 2' },
    });
  });

  it('rejects non-finite results', () => {
    expect(calculator.invoke({ expression: '1 / 0' })).toEqual({
      success: false,
      error: { kind: 'EvaluationError', message: 'Calculation error: result is not a finite number (Infinity)' },
      metadata: { expression: '1 / 0' },
    });
  });

  it('reports syntax errors and unknown names as EvaluationError', () => {
    const syntax = calculator.invoke({ expression: '2 +' });
    expect(syntax).toMatchObject({ success: false, error: { kind: 'EvaluationError' } });
    if (!syntax.success) {
      expect(syntax.error.message.startsWith('Calculation error: ')).toBe(true);
    }

    expect(calculator.invoke({ expression: 'foo + 1' })).toMatchObject({
      success: false,
      error: { kind: 'EvaluationError' },
    });
  });

  it('does not allow assignment', () => {
    expect(calculator.invoke({ expression: 'x = 3' })).toMatchObject({
      success: false,
      error: { kind: 'EvaluationError' },
    });
  });

  it('formats values as plain numbers', () => {
    expect(calculator.formatValue(2.5)).toBe('2.5');
  });
});
