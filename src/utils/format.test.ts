import { describe, it, expect } from 'vitest';
import { formatPercent, formatQuantity, formatUsd, formatWholeUsd } from './format';

describe('format', () => {
  it('should format dollar amounts with grouping and cents', () => {
    expect(formatUsd(1234567.891)).toBe('$1,234,567.89');
    expect(formatUsd(0)).toBe('$0.00');
  });

  it('should format whole dollar amounts', () => {
    expect(formatWholeUsd(1234567.891)).toBe('$1,234,568');
  });

  it('should format quantities with four decimals', () => {
    expect(formatQuantity(1234.5)).toBe('1,234.5000');
  });

  it('should format percentages with the requested precision', () => {
    expect(formatPercent(88.8888, 2)).toBe('88.89%');
    expect(formatPercent(11.111, 1)).toBe('11.1%');
  });
});
