import { loadUnitPatterns } from '../schema.config';
import type { UnitPositionRule } from '../unit-position.resolver';
import { createEngine } from './engine.fixtures';

describe('UnitPositionResolver', () => {
  describe('default unit tables', () => {
    const { units } = createEngine();

    it.each([
      ['$', 'BEFORE', 'exact-before'],
      ['¥', 'BEFORE', 'exact-before'],
      ['kg', 'AFTER', 'exact-after'],
      ['％', 'AFTER', 'exact-after'],
      ['円/kg', 'AFTER', 'long'],
      ['abcd', 'AFTER', 'long'],
      ['m/s', 'AFTER', 'compound'],
      ['a b', 'AFTER', 'compound'],
      ['US$', 'AFTER', 'compound'],
      ['kgs', 'AFTER', 'partial-after'],
      ['zz', 'AFTER', 'fallback'],
      ['', 'AFTER', 'empty'],
    ] as const)('%j -> %s (%s)', (unit, position, rule) => {
      expect(units.explain(unit)).toEqual({ position, rule });
    });

    it('puts every BEFORE symbol before the value', () => {
      for (const unit of loadUnitPatterns().before) {
        expect(units.resolve(unit)).toBe('BEFORE');
      }
    });

    it('puts every AFTER symbol after the value', () => {
      for (const unit of loadUnitPatterns().after) {
        expect(units.resolve(unit)).toBe('AFTER');
      }
    });

    it('puts units of four or more characters after the value', () => {
      for (const unit of ['$$$$', '＄USD', 'kg/m2', 'ドル建て']) {
        expect(units.explain(unit).rule).toBe('long');
        expect(units.resolve(unit)).toBe('AFTER');
      }
    });
  });

  describe('custom unit tables', () => {
    const { units } = createEngine({
      unitPatterns: { before: ['US', 'X'], after: ['X', 'kg'] },
    });

    it.each<[string, 'BEFORE' | 'AFTER', UnitPositionRule]>([
      ['X', 'AFTER', 'exact-both'],
      ['USD', 'BEFORE', 'partial-before'],
      ['Ukg', 'AFTER', 'partial-after'],
      ['USX', 'AFTER', 'partial-both'],
    ])('%j -> %s (%s)', (unit, position, rule) => {
      expect(units.explain(unit)).toEqual({ position, rule });
    });
  });

  describe('recommend', () => {
    const { units } = createEngine();

    it('returns null when the explicit position matches', () => {
      expect(units.recommend('$', 'BEFORE')).toBeNull();
    });

    it('describes a disagreeing position without replacing it', () => {
      expect(units.recommend('kg', 'BEFORE')).toBe(
        'unitPosition "BEFORE" for unit "kg" is unusual; "AFTER" is recommended',
      );
    });
  });
});
