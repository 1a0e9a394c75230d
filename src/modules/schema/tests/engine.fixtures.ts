import { SchemaValidationError } from '../../../lib/errors/SchemaValidationError';
import { FieldValidator } from '../field.validator';
import { LayoutOrganizer } from '../layout.organizer';
import { LayoutValidator } from '../layout.validator';
import {
  FORM_SCHEMA_DEFAULTS,
  loadUnitPatterns,
  type FormSchemaConfig,
} from '../schema.config';
import { UnitPositionResolver } from '../unit-position.resolver';

export function makeConfig(
  overrides: Partial<FormSchemaConfig> = {},
): FormSchemaConfig {
  return {
    ...FORM_SCHEMA_DEFAULTS,
    unitPatterns: loadUnitPatterns(),
    ...overrides,
  };
}

export interface Engine {
  readonly config: FormSchemaConfig;
  readonly units: UnitPositionResolver;
  readonly fields: FieldValidator;
  readonly layouts: LayoutValidator;
  readonly organizer: LayoutOrganizer;
}

/** The four providers wired by hand, without a Nest container. */
export function createEngine(overrides: Partial<FormSchemaConfig> = {}): Engine {
  const config = makeConfig(overrides);
  const units = new UnitPositionResolver(config);
  const layouts = new LayoutValidator();
  return {
    config,
    units,
    fields: new FieldValidator(config, units),
    layouts,
    organizer: new LayoutOrganizer(config, layouts),
  };
}

/** Run `fn` and return the engine error it throws. */
export function thrown(fn: () => unknown): SchemaValidationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof SchemaValidationError) return e;
    throw e;
  }
  throw new Error('expected a SchemaValidationError');
}
