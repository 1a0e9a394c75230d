import { AppError } from '../../../lib/errors/AppError';
import {
  LayoutPositionInvalidError,
  SchemaValidationError,
  toSchemaErrorCode,
} from '../../../lib/errors/SchemaValidationError';
import { ValidationHttpException } from '../../../lib/errors/ValidationHttpException';

describe('schema errors', () => {
  it('derives codes from kinds', () => {
    expect(toSchemaErrorCode('CalcExpressionEmpty')).toBe('SCHEMA_CALC_EXPRESSION_EMPTY');
    expect(toSchemaErrorCode('LookupMisconfigured')).toBe('SCHEMA_LOOKUP_MISCONFIGURED');
  });

  it('carries kind, path, suggestion and frozen details', () => {
    const err = new LayoutPositionInvalidError('No element with code "x" exists in the layout', {
      path: 'position.after',
      suggestion: '{ "index": 0 }',
      details: { target: 'x' },
    });
    expect(err).toBeInstanceOf(SchemaValidationError);
    expect(err).toBeInstanceOf(AppError);
    expect(err.name).toBe('LayoutPositionInvalidError');
    expect(err.code).toBe('SCHEMA_LAYOUT_POSITION_INVALID');
    expect(Object.isFrozen(err.details)).toBe(true);
    expect(err.toJSON()).toEqual({
      name: 'LayoutPositionInvalidError',
      code: 'SCHEMA_LAYOUT_POSITION_INVALID',
      message: 'No element with code "x" exists in the layout',
      kind: 'LayoutPositionInvalid',
      suggestion: '{ "index": 0 }',
      path: 'position.after',
    });
  });

  it('maps to a 422 with a standard body', () => {
    const ex = new ValidationHttpException(
      new LayoutPositionInvalidError('Group "g" does not exist in the layout', {
        path: 'position.groupCode',
      }),
    );
    expect(ex.getStatus()).toBe(422);
    expect(ex.getResponse()).toEqual({
      error: 'SchemaValidationError',
      code: 'SCHEMA_LAYOUT_POSITION_INVALID',
      kind: 'LayoutPositionInvalid',
      message: 'Group "g" does not exist in the layout',
      path: 'position.groupCode',
    });
  });
});
