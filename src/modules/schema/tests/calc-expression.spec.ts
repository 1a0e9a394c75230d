import {
  findUnsupportedFunction,
  stripTablePrefixes,
} from '../internal/calc-expression';

describe('calc expression checks', () => {
  describe('findUnsupportedFunction', () => {
    it('rewrites DAYS_BETWEEN into a DATE_FORMAT difference', () => {
      const match = findUnsupportedFunction('DAYS_BETWEEN(a,b)');
      expect(match?.fn.name).toBe('DAYS_BETWEEN');
      expect(match?.suggestion).toBe(
        'ROUNDDOWN(DATE_FORMAT(a, "YYYY/MM/DD") - DATE_FORMAT(b, "YYYY/MM/DD"), 0)',
      );
    });

    it('matches function names case-insensitively', () => {
      expect(findUnsupportedFunction('days_between(end, start)')?.fn.name).toBe(
        'DAYS_BETWEEN',
      );
    });

    it('joins CONCATENATE arguments with &', () => {
      expect(findUnsupportedFunction('CONCATENATE(first, ",", last)')?.suggestion).toBe(
        'first & "," & last',
      );
    });

    it('keeps precedence when CONCATENATE is part of a larger expression', () => {
      expect(findUnsupportedFunction('CONCATENATE(a, b) & c')?.suggestion).toBe(
        '(a & b) & c',
      );
    });

    it('rewrites date part functions', () => {
      expect(findUnsupportedFunction('MONTH(ordered_on) + 1')?.suggestion).toBe(
        'DATE_FORMAT(ordered_on, "MM") + 1',
      );
      expect(findUnsupportedFunction('YEAR(d)')?.suggestion).toBe(
        'DATE_FORMAT(d, "YYYY")',
      );
    });

    it('offers no rewrite when one of the calls has none', () => {
      const match = findUnsupportedFunction('YEAR(a) + AVERAGE(b)');
      expect(match?.fn.name).toBe('AVERAGE');
      expect(match?.suggestion).toBeUndefined();
    });

    it('ignores supported functions and names that only contain an unsupported one', () => {
      expect(findUnsupportedFunction('SUM(amount) * 2')).toBeUndefined();
      expect(findUnsupportedFunction('holiday + 1')).toBeUndefined();
    });
  });

  describe('stripTablePrefixes', () => {
    it('removes table names from dotted references', () => {
      expect(stripTablePrefixes('SUM(items.amount)')).toBe('SUM(amount)');
      expect(stripTablePrefixes('orders.items.qty * 2')).toBe('qty * 2');
    });

    it('ignores decimals and string literals', () => {
      expect(stripTablePrefixes('price * 1.08')).toBeUndefined();
      expect(stripTablePrefixes('IF(kind = "a.b", 1, 0)')).toBeUndefined();
    });

    it('restores literals around a stripped reference', () => {
      expect(stripTablePrefixes('IF(lines.kind = "a.b", 1.5, 0)')).toBe(
        'IF(kind = "a.b", 1.5, 0)',
      );
    });
  });
});
