import { readFileSync } from 'fs';
import * as path from 'path';
import { SYSTEM_FIELD_TYPES, type FieldTypeTag } from '../../lib/form';
import { isRecord } from '../../lib/types/json';
import { isNonEmptyString } from '../../lib/utils/strings';

/** DI token for the engine configuration. */
export const FORM_SCHEMA_CONFIG = Symbol('FORM_SCHEMA_CONFIG');

/**
 * Environment variable names.
 */
export const ENV_LOOKUP_MIN_WIDTH = 'FORM_LOOKUP_MIN_WIDTH';
export const ENV_UNIT_PATTERNS_FILE = 'FORM_UNIT_PATTERNS_FILE';

export const DEFAULT_UNIT_PATTERNS_FILE = path.resolve(
  __dirname,
  '../../../Data/unit-positions.json',
);

export interface UnitPatterns {
  /** Symbols written before the value, e.g. `$`. */
  readonly before: ReadonlyArray<string>;
  /** Symbols written after the value, e.g. `kg`. */
  readonly after: ReadonlyArray<string>;
}

export interface FormSchemaConfig {
  /** Minimum element width (px) the platform accepts for lookup fields. */
  readonly lookupMinWidth: number;
  /** Codes the platform reserves for its own system fields. */
  readonly reservedCodes: ReadonlyArray<string>;
  /** Field types the platform manages; never required in a layout. */
  readonly systemFieldTypes: ReadonlyArray<FieldTypeTag>;
  readonly unitPatterns: UnitPatterns;
}

export const RESERVED_FIELD_CODES: ReadonlyArray<string> = [
  '$id',
  '$revision',
  'レコード番号',
  '作成者',
  '作成日時',
  '更新者',
  '更新日時',
];

export const FORM_SCHEMA_DEFAULTS = {
  lookupMinWidth: 250,
  reservedCodes: RESERVED_FIELD_CODES,
  systemFieldTypes: SYSTEM_FIELD_TYPES,
} as const;

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function toStringList(value: unknown, key: string, file: string): string[] {
  if (!Array.isArray(value) || !value.every(isNonEmptyString)) {
    throw new Error(
      `Unit pattern file ${file}: "${key}" must be an array of non-empty strings`,
    );
  }
  return [...value];
}

/**
 * Read the BEFORE/AFTER unit tables.
 * Throws when the file is missing or malformed.
 */
export function loadUnitPatterns(
  file: string = DEFAULT_UNIT_PATTERNS_FILE,
): UnitPatterns {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!isRecord(raw)) {
    throw new Error(`Unit pattern file ${file}: expected a JSON object`);
  }
  return {
    before: toStringList(raw.before, 'before', file),
    after: toStringList(raw.after, 'after', file),
  };
}

/**
 * Load the engine config from env-style values.
 * A bad width falls back to the default; a bad pattern file throws.
 */
export function loadFormSchemaConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): FormSchemaConfig {
  const patternsFile = env[ENV_UNIT_PATTERNS_FILE]?.trim();
  return {
    lookupMinWidth: parsePositiveInt(
      env[ENV_LOOKUP_MIN_WIDTH],
      FORM_SCHEMA_DEFAULTS.lookupMinWidth,
    ),
    reservedCodes: FORM_SCHEMA_DEFAULTS.reservedCodes,
    systemFieldTypes: FORM_SCHEMA_DEFAULTS.systemFieldTypes,
    unitPatterns: loadUnitPatterns(patternsFile || DEFAULT_UNIT_PATTERNS_FILE),
  };
}
