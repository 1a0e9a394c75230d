import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CALC_FORMATS,
  DECORATIVE_FIELD_TYPES,
  FIELD_CODE_CHARS,
  FIELD_CODE_PATTERN,
  LINK_PROTOCOLS,
  REFERENCE_TABLE_SIZES,
  isFieldProperty,
  isLookupCapable,
  isUnitPosition,
  type CalcFieldProperty,
  type ChoiceFieldProperty,
  type ChoiceOption,
  type ChoiceOptionShorthand,
  type ChoiceOptions,
  type DateTimeFieldProperty,
  type FieldProperty,
  type LinkFieldProperty,
  type LookupCapableFieldProperty,
  type LookupConfig,
  type NumberFieldProperty,
  type ReferenceTableFieldProperty,
  type SubtableFieldProperty,
  type TextFieldProperty,
} from '../../lib/form';
import {
  CalcExpressionCrossTableReferenceError,
  CalcExpressionEmptyError,
  CalcExpressionUnsupportedFunctionError,
  FieldCodeInvalidCharactersError,
  FieldCodeReservedError,
  FieldConfigInvalidError,
  FieldTypeMissingError,
  LayoutStructuralViolationError,
  LinkProtocolInvalidError,
  LookupMisconfiguredError,
  NumericBoundsInvalidError,
  OptionsMissingOrMalformedError,
  ReferenceTableMisconfiguredError,
} from '../../lib/errors/SchemaValidationError';
import { isArray, isRecord } from '../../lib/types/json';
import { isNonEmptyString, toFiniteNumber } from '../../lib/utils/strings';
import {
  findUnsupportedFunction,
  stripTablePrefixes,
} from './internal/calc-expression';
import { FORM_SCHEMA_CONFIG, type FormSchemaConfig } from './schema.config';
import { UnitPositionResolver } from './unit-position.resolver';

export interface FieldValidationResult {
  readonly field: FieldProperty;
  readonly warnings: ReadonlyArray<string>;
}

export interface PropertiesValidationResult {
  readonly properties: Readonly<Record<string, FieldProperty>>;
  readonly warnings: ReadonlyArray<string>;
}

/** Per-call state: collected warnings + path prefix for nested fields. */
interface Ctx {
  readonly warnings: string[];
  readonly prefix: string;
}

const RESERVED_CODE_ALTERNATIVES: Readonly<Record<string, string>> = {
  レコード番号: 'Keep the built-in RECORD_NUMBER field, or add a SINGLE_LINE_TEXT field with another code',
  作成者: 'Keep the built-in CREATOR field, or add a USER_SELECT field with another code',
  更新者: 'Keep the built-in MODIFIER field, or add a USER_SELECT field with another code',
  作成日時: 'Keep the built-in CREATED_TIME field, or add a DATETIME field with another code',
  更新日時: 'Keep the built-in UPDATED_TIME field, or add a DATETIME field with another code',
};

const ALLOWED_CODE_CHARS_TEXT =
  'letters and digits (half or full width), hiragana, katakana (half or full width), kanji, "_", "＿", "･", "・", "＄", "￥"';

const OPTIONS_EXAMPLE =
  '{ "A": { "label": "A", "index": "0" }, "B": { "label": "B", "index": "1" } }';

const REFERENCE_TABLE_EXAMPLE =
  '{ "relatedApp": { "app": "12" }, "condition": { "field": "customer_id", "relatedField": "id" }, "size": 5 }';

const CALC_EXAMPLES = 'price * quantity, SUM(amount), IF(quantity > 10, price * 0.9, price)';

const DECORATIVE_TYPES: ReadonlySet<string> = new Set(DECORATIVE_FIELD_TYPES);

/** `"Order Date"` -> `"order_date"`; a leading digit gets an `f_` prefix. */
export function codeFromLabel(label: string): string {
  const code = label
    .replace(new RegExp(`[^${FIELD_CODE_CHARS}]`, 'gu'), '_')
    .toLowerCase();
  return /^[0-9０-９]/u.test(code) ? `f_${code}` : code;
}

function optionExample(key: string, label: string, index: string): string {
  return `"${key}": { "label": "${label}", "index": "${index}" }`;
}

function isOptionList(
  options: ChoiceFieldProperty['options'],
): options is ReadonlyArray<ChoiceOptionShorthand> {
  return Array.isArray(options);
}

/**
 * Validates and normalizes field definitions.
 * Returns a corrected copy plus warnings; throws a SchemaValidationError
 * subclass on the first violation it cannot repair.
 */
@Injectable()
export class FieldValidator {
  private readonly logger = new Logger(FieldValidator.name);
  private readonly reserved: ReadonlySet<string>;

  constructor(
    @Inject(FORM_SCHEMA_CONFIG) private readonly config: FormSchemaConfig,
    private readonly units: UnitPositionResolver,
  ) {
    this.reserved = new Set(config.reservedCodes);
  }

  public validate(field: FieldProperty): FieldValidationResult {
    const ctx: Ctx = { warnings: [], prefix: '' };
    return { field: this.run(field, ctx), warnings: ctx.warnings };
  }

  /** validate() for a definition read from the wire; fills code and label first. */
  public validateUnknown(raw: unknown): FieldValidationResult {
    const ctx: Ctx = { warnings: [], prefix: '' };
    const field = this.normalizeEntry(undefined, raw, 'field', ctx);
    return { field: this.run(field, ctx), warnings: ctx.warnings };
  }

  /**
   * Normalize a properties payload: a map (code -> field) or an array.
   * Fills codes and labels, converts list-shaped options, then validates each field.
   */
  public validateProperties(input: unknown): PropertiesValidationResult {
    const ctx: Ctx = { warnings: [], prefix: '' };
    let entries: Array<[string | undefined, unknown]>;
    if (isArray(input)) {
      entries = input.map((raw): [undefined, unknown] => [undefined, raw]);
    } else if (isRecord(input)) {
      entries = Object.entries(input);
    } else {
      throw new FieldConfigInvalidError(
        'Field properties must be an object keyed by field code, or an array of fields',
        { suggestion: '{ "title": { "type": "SINGLE_LINE_TEXT", "code": "title", "label": "Title" } }' },
      );
    }

    const properties: Record<string, FieldProperty> = {};
    entries.forEach(([key, raw], i) => {
      const path = key ?? `[${i}]`;
      const field = this.normalizeEntry(key, raw, path, ctx);
      if (DECORATIVE_TYPES.has(field.type)) {
        throw new FieldConfigInvalidError(
          `Field "${field.code}": ${field.type} is a layout element, not a field. Add it to the form layout instead`,
          { path, suggestion: `{ "type": "ROW", "fields": [{ "type": "${field.type}" }] }` },
        );
      }
      if (properties[field.code] !== undefined) {
        throw new FieldConfigInvalidError(
          `Field code "${field.code}" is defined more than once`,
          { path },
        );
      }
      properties[field.code] = this.run(field, { warnings: ctx.warnings, prefix: `${path}.` });
    });
    return { properties, warnings: ctx.warnings };
  }

  /* =========================
   *        Pipeline
   * ========================= */

  private run(field: FieldProperty, ctx: Ctx): FieldProperty {
    const positioned = this.withUnitPosition(field, ctx);
    this.assertCode(positioned.code, ctx);
    const checked = this.dispatch(positioned, ctx);
    return this.withLookup(checked, ctx);
  }

  private dispatch(field: FieldProperty, ctx: Ctx): FieldProperty {
    switch (field.type) {
      case 'SINGLE_LINE_TEXT':
      case 'MULTI_LINE_TEXT':
        return this.text(field, ctx);
      case 'NUMBER':
        return this.number(field, ctx);
      case 'CALC':
        return this.calc(field, ctx);
      case 'CHECK_BOX':
      case 'RADIO_BUTTON':
      case 'DROP_DOWN':
      case 'MULTI_SELECT':
        return this.choice(field, ctx);
      case 'DATE':
      case 'TIME':
      case 'DATETIME':
        return this.dateTime(field, ctx);
      case 'LINK':
        return this.link(field, ctx);
      case 'REFERENCE_TABLE':
        return this.referenceTable(field, ctx);
      case 'SUBTABLE':
        return this.subtable(field, ctx);
      case 'RICH_TEXT':
      case 'FILE':
      case 'USER_SELECT':
      case 'GROUP_SELECT':
      case 'ORGANIZATION_SELECT':
      case 'GROUP':
      case 'STATUS':
      case 'STATUS_ASSIGNEE':
      case 'CATEGORY':
      case 'RELATED_RECORDS':
      case 'RECORD_NUMBER':
      case 'CREATOR':
      case 'MODIFIER':
      case 'CREATED_TIME':
      case 'UPDATED_TIME':
      case '__ID__':
      case '__REVISION__':
      case 'LABEL':
      case 'SPACER':
      case 'HR':
        return field;
      default: {
        const unreachable: never = field;
        throw new FieldTypeMissingError(
          `Unsupported field type in ${JSON.stringify(unreachable)}`,
        );
      }
    }
  }

  /* =========================
   *     Shared field rules
   * ========================= */

  private withUnitPosition(field: FieldProperty, ctx: Ctx): FieldProperty {
    if (field.type !== 'NUMBER' && field.type !== 'CALC') return field;
    if (!isNonEmptyString(field.unit)) return field;

    const current = field.unitPosition;
    if (current === undefined || current === '') {
      const position = this.units.resolve(field.unit);
      this.notice(
        ctx,
        `Field "${field.code}": unitPosition set to "${position}" for unit "${field.unit}"`,
      );
      return { ...field, unitPosition: position };
    }
    if (isUnitPosition(current)) {
      const hint = this.units.recommend(field.unit, current);
      if (hint) this.warn(ctx, `Field "${field.code}": ${hint}`);
    }
    return field;
  }

  private assertCode(code: string, ctx: Ctx): void {
    if (!isNonEmptyString(code)) {
      throw new FieldCodeInvalidCharactersError('Field code is required', {
        path: this.at(ctx, 'code'),
      });
    }
    if (this.reserved.has(code)) {
      throw new FieldCodeReservedError(
        code,
        `Field code "${code}" is reserved for a system field. Every app already has RECORD_NUMBER, CREATOR, MODIFIER, CREATED_TIME and UPDATED_TIME fields`,
        {
          path: this.at(ctx, 'code'),
          suggestion: RESERVED_CODE_ALTERNATIVES[code] ?? 'Use a different field code',
        },
      );
    }
    if (!FIELD_CODE_PATTERN.test(code)) {
      throw new FieldCodeInvalidCharactersError(
        `Field code "${code}" contains characters that are not allowed. Allowed: ${ALLOWED_CODE_CHARS_TEXT}`,
        { path: this.at(ctx, 'code'), suggestion: codeFromLabel(code) },
      );
    }
  }

  private withLookup(field: FieldProperty, ctx: Ctx): FieldProperty {
    if (!('lookup' in field) || field.lookup === undefined) return field;
    if (!isLookupCapable(field) || field.type === 'MULTI_LINE_TEXT') {
      throw new LookupMisconfiguredError(
        `Field "${field.code}": lookup is supported on SINGLE_LINE_TEXT, NUMBER and LINK fields only, not ${field.type}`,
        { path: this.at(ctx, 'lookup') },
      );
    }
    const lookup = this.lookup(field, field.lookup, ctx);
    return {
      ...field,
      lookup,
      _recommendedMinWidth: String(this.config.lookupMinWidth),
    };
  }

  private lookup(
    field: LookupCapableFieldProperty,
    lookup: LookupConfig | undefined,
    ctx: Ctx,
  ): LookupConfig {
    const fail = (message: string, rel: string, suggestion?: string): never => {
      throw new LookupMisconfiguredError(`Field "${field.code}": ${message}`, {
        path: this.at(ctx, rel),
        ...(suggestion !== undefined ? { suggestion } : {}),
      });
    };

    if (!isRecord(lookup)) return fail('lookup must be an object', 'lookup');
    const app = lookup.relatedApp;
    if (
      !isRecord(app) ||
      !(typeof app.app === 'number' || isNonEmptyString(app.app) || isNonEmptyString(app.code))
    ) {
      fail(
        'lookup.relatedApp needs an app id (app) or an app code (code)',
        'lookup.relatedApp',
        '"relatedApp": { "app": "12" }',
      );
    }
    const key = lookup.relatedKeyField;
    if (!isNonEmptyString(key)) {
      return fail('lookup.relatedKeyField is required', 'lookup.relatedKeyField');
    }
    const mappings = lookup.fieldMappings;
    if (!isArray(mappings) || mappings.length === 0) {
      return fail(
        'lookup.fieldMappings needs at least one { field, relatedField } entry',
        'lookup.fieldMappings',
        '"fieldMappings": [{ "field": "customer_name", "relatedField": "name" }]',
      );
    }
    mappings.forEach((m, i) => {
      const rel = `lookup.fieldMappings[${i}]`;
      if (!isRecord(m) || !isNonEmptyString(m.field) || !isNonEmptyString(m.relatedField)) {
        fail(`${rel} needs both field and relatedField`, rel);
      } else if (m.relatedField === key) {
        fail(
          `${rel} maps the key field "${key}"; the key field is copied by the lookup itself and must not be mapped`,
          rel,
        );
      }
    });

    let result: LookupConfig = lookup;
    if (!isArray(lookup.lookupPickerFields) || lookup.lookupPickerFields.length === 0) {
      result = { ...result, lookupPickerFields: [key] };
      this.warn(ctx, `Field "${field.code}": lookupPickerFields defaulted to ["${key}"]`);
    }
    if (!isNonEmptyString(lookup.sort)) {
      result = { ...result, sort: `${key} asc` };
      this.warn(ctx, `Field "${field.code}": lookup sort defaulted to "${key} asc"`);
    }
    return result;
  }

  /* =========================
   *     Per-type handlers
   * ========================= */

  private text(field: TextFieldProperty, ctx: Ctx): TextFieldProperty {
    this.lengthBounds(field, ctx);
    return field;
  }

  private number(field: NumberFieldProperty, ctx: Ctx): NumberFieldProperty {
    let out: NumberFieldProperty = field;
    if (field.displayScale === '') {
      const { displayScale: _blank, ...rest } = field;
      out = rest;
      this.warn(ctx, `Field "${field.code}": empty displayScale removed`);
    }
    const digit = this.numericDisplay(out, ctx);

    const min = this.numberOrThrow(out.minValue, 'minValue', out.code, ctx);
    const max = this.numberOrThrow(out.maxValue, 'maxValue', out.code, ctx);
    if (min !== undefined && max !== undefined && min > max) {
      throw new NumericBoundsInvalidError(
        `Field "${out.code}": minValue (${min}) is greater than maxValue (${max})`,
        { path: this.at(ctx, 'minValue') },
      );
    }
    return digit === undefined ? out : { ...out, digit };
  }

  private calc(field: CalcFieldProperty, ctx: Ctx): CalcFieldProperty {
    let out: CalcFieldProperty = field;
    if (out.expression === undefined && out.formula !== undefined) {
      const { formula, ...rest } = out;
      out = { ...rest, expression: formula };
      this.warn(ctx, `Field "${out.code}": "formula" renamed to "expression"`);
    }

    const digit = this.flag(out.digit, 'digit', out.code, ctx);
    if (digit === true && (out.format === undefined || out.format === 'NUMBER')) {
      out = { ...out, format: 'NUMBER_DIGIT' };
      this.notice(ctx, `Field "${out.code}": format set to "NUMBER_DIGIT" because digit is true`);
    }

    const expression = out.expression;
    if (!isNonEmptyString(expression) || expression.trim() === '') {
      throw new CalcExpressionEmptyError(
        `Field "${out.code}": a CALC field needs a non-empty expression. Examples: ${CALC_EXAMPLES}`,
        { path: this.at(ctx, 'expression') },
      );
    }

    const unsupported = findUnsupportedFunction(expression);
    if (unsupported) {
      const { fn, suggestion } = unsupported;
      throw new CalcExpressionUnsupportedFunctionError(
        fn.name,
        `Field "${out.code}": function ${fn.name} is not supported in calculated fields. ${fn.alternative}` +
          (suggestion !== undefined ? `. Rewrite: ${suggestion}` : ''),
        {
          path: this.at(ctx, 'expression'),
          details: { alternative: fn.alternative },
          ...(suggestion !== undefined ? { suggestion } : {}),
        },
      );
    }

    const stripped = stripTablePrefixes(expression);
    if (stripped !== undefined) {
      throw new CalcExpressionCrossTableReferenceError(
        `Field "${out.code}": refer to table fields by their own code, without the table name. Field codes are unique within an app. Use: ${stripped}`,
        { path: this.at(ctx, 'expression'), suggestion: stripped },
      );
    }

    if (out.format === undefined) {
      out = { ...out, format: 'NUMBER_DIGIT' };
      this.notice(ctx, `Field "${out.code}": format defaulted to "NUMBER_DIGIT"`);
    } else if (!CALC_FORMATS.some((f) => f === out.format)) {
      throw new FieldConfigInvalidError(
        `Field "${out.code}": format "${out.format}" is not valid. Allowed: ${CALC_FORMATS.join(', ')}`,
        { path: this.at(ctx, 'format') },
      );
    }

    if (out.format === 'NUMBER' || out.format === 'NUMBER_DIGIT') {
      this.numericDisplay(out, ctx);
    }
    return digit === undefined ? out : { ...out, digit };
  }

  private choice(field: ChoiceFieldProperty, ctx: Ctx): ChoiceFieldProperty {
    const raw = field.options;
    if (raw === undefined || raw === null) {
      throw new OptionsMissingOrMalformedError(
        null,
        `Field "${field.code}": ${field.type} needs options. Shape: ${OPTIONS_EXAMPLE}`,
        { path: this.at(ctx, 'options'), suggestion: OPTIONS_EXAMPLE },
      );
    }
    const options = isOptionList(raw) ? this.optionsFromList(field, raw, ctx) : raw;
    if (!isRecord(options) || Object.keys(options).length === 0) {
      throw new OptionsMissingOrMalformedError(
        null,
        `Field "${field.code}": options must be a non-empty object keyed by choice. Shape: ${OPTIONS_EXAMPLE}`,
        { path: this.at(ctx, 'options'), suggestion: OPTIONS_EXAMPLE },
      );
    }

    const normalized: Record<string, ChoiceOption> = {};
    Object.entries(options).forEach(([key, option], position) => {
      const path = this.at(ctx, `options.${key}`);
      const entry: Record<string, unknown> = isRecord(option) ? option : {};
      const label = isNonEmptyString(entry.label) ? entry.label : undefined;
      if (label === undefined) {
        const example = optionExample(key, key, String(position));
        throw new OptionsMissingOrMalformedError(
          key,
          `Field "${field.code}": option "${key}" has no label. Use: ${example}`,
          { path, suggestion: example },
        );
      }
      const index = entry.index;
      if (typeof index !== 'string' || !/^\d+$/.test(index)) {
        const fixed =
          typeof index === 'number' && Number.isInteger(index) && index >= 0
            ? String(index)
            : String(position);
        const example = optionExample(key, label, fixed);
        const problem =
          index === undefined
            ? 'has no index'
            : `has index ${JSON.stringify(index)}; index must be a non-negative integer written as a string`;
        throw new OptionsMissingOrMalformedError(
          key,
          `Field "${field.code}": option "${key}" ${problem}. Use: ${example}`,
          { path, suggestion: example },
        );
      }
      if (label !== key) {
        this.warn(
          ctx,
          `Field "${field.code}": option key "${key}" differs from its label "${label}"`,
        );
      }
      normalized[key] = { label, index };
    });
    return { ...field, options: normalized };
  }

  private optionsFromList(
    field: ChoiceFieldProperty,
    list: ReadonlyArray<ChoiceOptionShorthand>,
    ctx: Ctx,
  ): ChoiceOptions {
    const out: Record<string, ChoiceOption> = {};
    list.forEach((entry, i) => {
      if (typeof entry === 'string') {
        out[entry] = { label: entry, index: String(i) };
        return;
      }
      if (isRecord(entry) && isNonEmptyString(entry.label)) {
        const key = isNonEmptyString(entry.value) ? entry.value : entry.label;
        out[key] = { label: entry.label, index: String(i) };
        return;
      }
      throw new OptionsMissingOrMalformedError(
        null,
        `Field "${field.code}": list option ${i} needs a label (a string, or { "label": ..., "value"?: ... })`,
        { path: this.at(ctx, `options[${i}]`), suggestion: OPTIONS_EXAMPLE },
      );
    });
    this.notice(ctx, `Field "${field.code}": options converted from list to object form`);
    return out;
  }

  private dateTime(field: DateTimeFieldProperty, ctx: Ctx): DateTimeFieldProperty {
    const now = this.flag(field.defaultNowValue, 'defaultNowValue', field.code, ctx);
    return now === undefined ? field : { ...field, defaultNowValue: now };
  }

  private link(field: LinkFieldProperty, ctx: Ctx): LinkFieldProperty {
    const allowed = LINK_PROTOCOLS.join(', ');
    if (!isNonEmptyString(field.protocol)) {
      throw new LinkProtocolInvalidError(
        `Field "${field.code}": a LINK field needs a protocol (${allowed})`,
        { path: this.at(ctx, 'protocol'), suggestion: '"protocol": "WEB"' },
      );
    }
    const protocol = field.protocol;
    if (!LINK_PROTOCOLS.some((p) => p === protocol)) {
      throw new LinkProtocolInvalidError(
        `Field "${field.code}": protocol "${protocol}" is not valid. Allowed: ${allowed}`,
        { path: this.at(ctx, 'protocol'), suggestion: '"protocol": "WEB"' },
      );
    }
    this.lengthBounds(field, ctx);
    return field;
  }

  private referenceTable(
    field: ReferenceTableFieldProperty,
    ctx: Ctx,
  ): ReferenceTableFieldProperty {
    const fail = (message: string, rel: string): never => {
      throw new ReferenceTableMisconfiguredError(
        `Field "${field.code}": ${message}. Shape: ${REFERENCE_TABLE_EXAMPLE}`,
        { path: this.at(ctx, rel), suggestion: REFERENCE_TABLE_EXAMPLE },
      );
    };

    const table = field.referenceTable;
    if (!isRecord(table)) return fail('referenceTable is required', 'referenceTable');
    const app = table.relatedApp;
    if (
      !isRecord(app) ||
      !(typeof app.app === 'number' || isNonEmptyString(app.app) || isNonEmptyString(app.code))
    ) {
      fail(
        'referenceTable.relatedApp needs an app id (app) or an app code (code)',
        'referenceTable.relatedApp',
      );
    }
    const condition = table.condition;
    if (!isRecord(condition)) {
      return fail('referenceTable.condition is required', 'referenceTable.condition');
    }
    if (!isNonEmptyString(condition.field)) {
      fail('referenceTable.condition.field (a field of this app) is required', 'referenceTable.condition.field');
    }
    if (!isNonEmptyString(condition.relatedField)) {
      fail(
        'referenceTable.condition.relatedField (a field of the related app) is required',
        'referenceTable.condition.relatedField',
      );
    }
    const size = table.size;
    if (size !== undefined && !REFERENCE_TABLE_SIZES.some((s) => String(s) === String(size))) {
      throw new ReferenceTableMisconfiguredError(
        `Field "${field.code}": referenceTable.size must be one of ${REFERENCE_TABLE_SIZES.join(', ')}`,
        { path: this.at(ctx, 'referenceTable.size'), suggestion: '"size": 5' },
      );
    }
    return field;
  }

  private subtable(field: SubtableFieldProperty, ctx: Ctx): SubtableFieldProperty {
    const inner = field.fields;
    if (!isRecord(inner) || Object.keys(inner).length === 0) {
      throw new FieldConfigInvalidError(
        `Field "${field.code}": a SUBTABLE needs a non-empty "fields" object`,
        {
          path: this.at(ctx, 'fields'),
          suggestion: '"fields": { "item": { "type": "SINGLE_LINE_TEXT", "code": "item", "label": "Item" } }',
        },
      );
    }

    const fields: Record<string, FieldProperty> = {};
    for (const [key, raw] of Object.entries(inner)) {
      const path = this.at(ctx, `fields.${key}`);
      const normalized = this.normalizeEntry(key, raw, path, ctx);
      if (normalized.type === 'SUBTABLE' || normalized.type === 'GROUP') {
        throw new LayoutStructuralViolationError(
          `Field "${field.code}": a SUBTABLE cannot contain a ${normalized.type} ("${normalized.code}"). Tables hold plain fields only`,
          { path },
        );
      }
      fields[normalized.code] = this.run(normalized, {
        warnings: ctx.warnings,
        prefix: `${path}.`,
      });
    }
    return { ...field, fields };
  }

  /* =========================
   *        Helpers
   * ========================= */

  /** Fill code (from key or label) and label, then require a known type. */
  private normalizeEntry(
    key: string | undefined,
    raw: unknown,
    path: string,
    ctx: Ctx,
  ): FieldProperty {
    if (!isRecord(raw)) {
      throw new FieldConfigInvalidError(`Field ${path} must be an object`, { path });
    }

    let code: string;
    if (isNonEmptyString(raw.code)) {
      code = raw.code;
      if (key !== undefined && key !== code) {
        throw new FieldCodeInvalidCharactersError(
          `Field key "${key}" does not match its code "${code}"; the key must equal the code`,
          { path: `${path}.code`, suggestion: key },
        );
      }
    } else if (key !== undefined) {
      code = key;
    } else if (isNonEmptyString(raw.label)) {
      code = codeFromLabel(raw.label);
      this.warn(ctx, `Field "${raw.label}": code generated as "${code}"`);
    } else {
      throw new FieldCodeInvalidCharactersError(
        `Field ${path} needs a code or a label to derive one from`,
        { path },
      );
    }

    let label: string;
    if (typeof raw.label === 'string') {
      label = raw.label;
    } else {
      label = code;
      this.warn(ctx, `Field "${code}": label defaulted to the code`);
    }

    if (raw.type === undefined || raw.type === null || raw.type === '') {
      throw new FieldTypeMissingError(`Field "${code}" has no type`, {
        path: `${path}.type`,
        suggestion: `{ "type": "SINGLE_LINE_TEXT", "code": "${code}", "label": "${label}" }`,
      });
    }
    const candidate = { ...raw, code, label };
    if (!isFieldProperty(candidate)) {
      throw new FieldConfigInvalidError(
        `Field "${code}": unknown type ${JSON.stringify(raw.type)}`,
        { path: `${path}.type` },
      );
    }
    return candidate;
  }

  /** displayScale, digit and unitPosition shared by NUMBER and numeric CALC. */
  private numericDisplay(
    field: NumberFieldProperty | CalcFieldProperty,
    ctx: Ctx,
  ): boolean | undefined {
    if (field.displayScale !== undefined) {
      this.integerIn(field.displayScale, 0, 10, 'displayScale', field.code, ctx);
    }
    const position = field.unitPosition;
    if (position !== undefined && position !== '' && !isUnitPosition(position)) {
      throw new FieldConfigInvalidError(
        `Field "${field.code}": unitPosition "${position}" is not valid. Allowed: BEFORE, AFTER`,
        { path: this.at(ctx, 'unitPosition') },
      );
    }
    return this.flag(field.digit, 'digit', field.code, ctx);
  }

  private lengthBounds(field: TextFieldProperty | LinkFieldProperty, ctx: Ctx): void {
    const max = this.integerIn(field.maxLength, 1, 64000, 'maxLength', field.code, ctx);
    const min = this.integerIn(field.minLength, 0, 64000, 'minLength', field.code, ctx);
    if (min !== undefined && max !== undefined && min > max) {
      throw new NumericBoundsInvalidError(
        `Field "${field.code}": minLength (${min}) is greater than maxLength (${max})`,
        { path: this.at(ctx, 'minLength') },
      );
    }
  }

  private integerIn(
    value: unknown,
    lo: number,
    hi: number,
    name: string,
    code: string,
    ctx: Ctx,
  ): number | undefined {
    if (value === undefined) return undefined;
    const n = toFiniteNumber(value);
    if (n === undefined || !Number.isInteger(n) || n < lo || n > hi) {
      throw new NumericBoundsInvalidError(
        `Field "${code}": ${name} must be an integer from ${lo} to ${hi}, got ${JSON.stringify(value)}`,
        { path: this.at(ctx, name) },
      );
    }
    return n;
  }

  private numberOrThrow(
    value: unknown,
    name: string,
    code: string,
    ctx: Ctx,
  ): number | undefined {
    if (value === undefined || value === '') return undefined;
    const n = toFiniteNumber(value);
    if (n === undefined) {
      throw new NumericBoundsInvalidError(
        `Field "${code}": ${name} must be a number, got ${JSON.stringify(value)}`,
        { path: this.at(ctx, name) },
      );
    }
    return n;
  }

  /** true / false / "true" / "false" -> boolean; absent -> undefined. */
  private flag(
    value: unknown,
    name: string,
    code: string,
    ctx: Ctx,
  ): boolean | undefined {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    throw new FieldConfigInvalidError(
      `Field "${code}": ${name} must be true or false, got ${JSON.stringify(value)}`,
      { path: this.at(ctx, name) },
    );
  }

  private at(ctx: Ctx, rel: string): string {
    return `${ctx.prefix}${rel}`;
  }

  private notice(ctx: Ctx, message: string): void {
    this.logger.log(message);
    ctx.warnings.push(message);
  }

  private warn(ctx: Ctx, message: string): void {
    this.logger.warn(message);
    ctx.warnings.push(message);
  }
}
