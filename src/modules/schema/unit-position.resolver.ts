import { Inject, Injectable, Logger } from '@nestjs/common';
import type { UnitPosition } from '../../lib/form';
import { codePointLength } from '../../lib/utils/strings';
import { FORM_SCHEMA_CONFIG, type FormSchemaConfig } from './schema.config';

export type UnitPositionRule =
  | 'empty'
  | 'long'
  | 'compound'
  | 'exact-both'
  | 'exact-before'
  | 'exact-after'
  | 'partial-both'
  | 'partial-before'
  | 'partial-after'
  | 'fallback';

export interface UnitPositionDecision {
  readonly position: UnitPosition;
  readonly rule: UnitPositionRule;
}

const COMPOUND_SEPARATORS = /[\s/\-+]/u;
// word chars, hiragana, katakana, kanji
const SIMPLE_UNIT_CHAR = /^[\p{L}\p{N}_\u3040-\u309F\u30A0-\u30FF\u4E00-\u9FAF]$/u;

/**
 * Decides whether a unit symbol renders before or after the value.
 * First matching rule wins; ties between the tables go to AFTER.
 */
@Injectable()
export class UnitPositionResolver {
  private readonly logger = new Logger(UnitPositionResolver.name);
  private readonly before: ReadonlySet<string>;
  private readonly after: ReadonlySet<string>;

  constructor(@Inject(FORM_SCHEMA_CONFIG) config: FormSchemaConfig) {
    this.before = new Set(config.unitPatterns.before);
    this.after = new Set(config.unitPatterns.after);
  }

  public resolve(unit: string): UnitPosition {
    return this.explain(unit).position;
  }

  /** Same as resolve(), plus the name of the rule that decided it. */
  public explain(unit: string): UnitPositionDecision {
    const decision = this.decide(unit);
    if (decision.rule === 'exact-both' || decision.rule === 'partial-both') {
      this.logger.warn(
        `Unit "${unit}" matches both BEFORE and AFTER patterns; using AFTER`,
      );
    }
    this.logger.debug(
      `Unit "${unit}" -> ${decision.position} (${decision.rule})`,
    );
    return decision;
  }

  /**
   * Returns a warning when an explicit position disagrees with the
   * resolved one, otherwise null. The explicit value is never replaced.
   */
  public recommend(unit: string, current: UnitPosition): string | null {
    const recommended = this.resolve(unit);
    if (recommended === current) return null;
    return `unitPosition "${current}" for unit "${unit}" is unusual; "${recommended}" is recommended`;
  }

  private decide(unit: string): UnitPositionDecision {
    if (unit === '') return { position: 'AFTER', rule: 'empty' };

    const length = codePointLength(unit);
    if (length >= 4) return { position: 'AFTER', rule: 'long' };

    if (isCompound(unit, length)) {
      return { position: 'AFTER', rule: 'compound' };
    }

    const inBefore = this.before.has(unit);
    const inAfter = this.after.has(unit);
    if (inBefore && inAfter) return { position: 'AFTER', rule: 'exact-both' };
    if (inBefore) return { position: 'BEFORE', rule: 'exact-before' };
    if (inAfter) return { position: 'AFTER', rule: 'exact-after' };

    const partialBefore = containsAny(unit, this.before);
    const partialAfter = containsAny(unit, this.after);
    if (partialBefore && partialAfter) {
      return { position: 'AFTER', rule: 'partial-both' };
    }
    if (partialBefore) return { position: 'BEFORE', rule: 'partial-before' };
    if (partialAfter) return { position: 'AFTER', rule: 'partial-after' };

    return { position: 'AFTER', rule: 'fallback' };
  }
}

function isCompound(unit: string, length: number): boolean {
  if (COMPOUND_SEPARATORS.test(unit)) return true;
  if (length <= 1) return false;
  return Array.from(unit).some((ch) => !SIMPLE_UNIT_CHAR.test(ch));
}

function containsAny(unit: string, patterns: ReadonlySet<string>): boolean {
  for (const p of patterns) {
    if (unit.includes(p)) return true;
  }
  return false;
}
