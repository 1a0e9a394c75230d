import { isRecord } from '../types/json';

/**
 * Field definitions as exchanged with the form platform.
 * A field-properties payload is a map of field code -> FieldProperty.
 *
 * Config members are typed as callers may author them (e.g. `index` as a number);
 * the FieldValidator narrows them to the shape the platform accepts.
 */

export const FIELD_TYPE_TAGS = [
  'SINGLE_LINE_TEXT',
  'MULTI_LINE_TEXT',
  'RICH_TEXT',
  'NUMBER',
  'CALC',
  'CHECK_BOX',
  'RADIO_BUTTON',
  'DROP_DOWN',
  'MULTI_SELECT',
  'DATE',
  'TIME',
  'DATETIME',
  'FILE',
  'LINK',
  'USER_SELECT',
  'GROUP_SELECT',
  'ORGANIZATION_SELECT',
  'REFERENCE_TABLE',
  'SUBTABLE',
  'GROUP',
  'STATUS',
  'STATUS_ASSIGNEE',
  'CATEGORY',
  'RELATED_RECORDS',
  'RECORD_NUMBER',
  'CREATOR',
  'MODIFIER',
  'CREATED_TIME',
  'UPDATED_TIME',
  '__ID__',
  '__REVISION__',
  'LABEL',
  'SPACER',
  'HR',
] as const;

export type FieldTypeTag = (typeof FIELD_TYPE_TAGS)[number];

export const CHOICE_FIELD_TYPES = [
  'CHECK_BOX',
  'RADIO_BUTTON',
  'DROP_DOWN',
  'MULTI_SELECT',
] as const;
export type ChoiceFieldType = (typeof CHOICE_FIELD_TYPES)[number];

export const DATE_TIME_FIELD_TYPES = ['DATE', 'TIME', 'DATETIME'] as const;
export type DateTimeFieldType = (typeof DATE_TIME_FIELD_TYPES)[number];

export const MEMBER_SELECT_FIELD_TYPES = [
  'USER_SELECT',
  'GROUP_SELECT',
  'ORGANIZATION_SELECT',
] as const;
export type MemberSelectFieldType = (typeof MEMBER_SELECT_FIELD_TYPES)[number];

/** Fields the platform creates and manages on every app. */
export const SYSTEM_FIELD_TYPES = [
  'RECORD_NUMBER',
  '__ID__',
  '__REVISION__',
  'CREATOR',
  'CREATED_TIME',
  'MODIFIER',
  'UPDATED_TIME',
] as const;

/** Process-management and category fields: platform-managed, never placed by hand. */
export const MANAGED_FIELD_TYPES = [
  'STATUS',
  'STATUS_ASSIGNEE',
  'CATEGORY',
  'RELATED_RECORDS',
] as const;

/** Layout-only pseudo-fields (no stored value). */
export const DECORATIVE_FIELD_TYPES = ['LABEL', 'SPACER', 'HR'] as const;

export const CALC_FORMATS = [
  'NUMBER',
  'NUMBER_DIGIT',
  'DATETIME',
  'DATE',
  'TIME',
  'HOUR_MINUTE',
  'DAY_HOUR_MINUTE',
] as const;
export type CalcFormat = (typeof CALC_FORMATS)[number];

export const LINK_PROTOCOLS = ['WEB', 'CALL', 'MAIL'] as const;
export type LinkProtocol = (typeof LINK_PROTOCOLS)[number];

export const UNIT_POSITIONS = ['BEFORE', 'AFTER'] as const;
export type UnitPosition = (typeof UNIT_POSITIONS)[number];

export const REFERENCE_TABLE_SIZES = [1, 3, 5, 10, 20, 30, 40, 50] as const;

/**
 * Characters allowed in a field code: ASCII and full-width alphanumerics,
 * hiragana, katakana (full and half width), kanji, `_` / `＿`, `･` / `・`, `＄`, `￥`.
 */
export const FIELD_CODE_CHARS =
  'A-Za-z0-9０-９Ａ-Ｚａ-ｚぁ-んァ-ヶーｦ-ﾟ一-龠々＿_･・＄￥';

export const FIELD_CODE_PATTERN = new RegExp(`^[${FIELD_CODE_CHARS}]+$`, 'u');

/* =========================
 *     Shared payloads
 * ========================= */

export interface RelatedApp {
  readonly app?: string | number;
  readonly code?: string;
}

export interface FieldMapping {
  readonly field?: string;
  readonly relatedField?: string;
}

export interface LookupConfig {
  readonly relatedApp?: RelatedApp;
  readonly relatedKeyField?: string;
  readonly fieldMappings?: ReadonlyArray<FieldMapping>;
  readonly lookupPickerFields?: ReadonlyArray<string>;
  readonly sort?: string;
  readonly filterCond?: string;
}

export interface ChoiceOption {
  readonly label?: string;
  /** Non-negative integer encoded as a string, e.g. "0". */
  readonly index?: string | number;
}

export type ChoiceOptions = Readonly<Record<string, ChoiceOption>>;

/** Shorthand accepted on input and converted to ChoiceOptions. */
export type ChoiceOptionShorthand =
  | string
  | { readonly label?: string; readonly value?: string };

export interface ReferenceTableConfig {
  readonly relatedApp?: RelatedApp;
  readonly condition?: {
    readonly field?: string;
    readonly relatedField?: string;
  };
  readonly filterCond?: string;
  readonly displayFields?: ReadonlyArray<string>;
  readonly sort?: string;
  readonly size?: string | number;
}

/* =========================
 *     Field variants
 * ========================= */

interface FieldBase<T extends FieldTypeTag> {
  readonly type: T;
  readonly code: string;
  readonly label: string;
  readonly required?: boolean;
  readonly noLabel?: boolean;
  /** Engine-computed layout hint (numeric string); never authored by hand. */
  readonly _recommendedMinWidth?: string;
}

export interface TextFieldProperty
  extends FieldBase<'SINGLE_LINE_TEXT' | 'MULTI_LINE_TEXT'> {
  readonly maxLength?: string | number;
  readonly minLength?: string | number;
  readonly defaultValue?: string;
  readonly unique?: boolean;
  readonly expression?: string;
  readonly lookup?: LookupConfig;
}

export interface RichTextFieldProperty extends FieldBase<'RICH_TEXT'> {
  readonly defaultValue?: string;
}

export interface NumberFieldProperty extends FieldBase<'NUMBER'> {
  readonly unit?: string;
  readonly unitPosition?: string;
  readonly displayScale?: string | number;
  readonly digit?: boolean | string;
  readonly minValue?: string | number;
  readonly maxValue?: string | number;
  readonly defaultValue?: string | number;
  readonly unique?: boolean;
  readonly lookup?: LookupConfig;
}

export interface CalcFieldProperty extends FieldBase<'CALC'> {
  readonly expression?: string;
  /** Legacy alias of `expression`; renamed during validation. */
  readonly formula?: string;
  readonly format?: string;
  readonly unit?: string;
  readonly unitPosition?: string;
  readonly displayScale?: string | number;
  readonly digit?: boolean | string;
  readonly hideExpression?: boolean;
}

export interface ChoiceFieldProperty extends FieldBase<ChoiceFieldType> {
  readonly options?: ChoiceOptions | ReadonlyArray<ChoiceOptionShorthand>;
  readonly defaultValue?: string | ReadonlyArray<string>;
  readonly align?: 'HORIZONTAL' | 'VERTICAL';
}

export interface DateTimeFieldProperty extends FieldBase<DateTimeFieldType> {
  readonly defaultNowValue?: boolean | string;
  readonly defaultValue?: string;
  readonly unique?: boolean;
}

export interface LinkFieldProperty extends FieldBase<'LINK'> {
  readonly protocol?: string;
  readonly maxLength?: string | number;
  readonly minLength?: string | number;
  readonly defaultValue?: string;
  readonly unique?: boolean;
  readonly lookup?: LookupConfig;
}

export interface MemberSelectFieldProperty
  extends FieldBase<MemberSelectFieldType> {
  readonly entities?: ReadonlyArray<{
    readonly type: string;
    readonly code: string;
  }>;
  readonly defaultValue?: ReadonlyArray<{
    readonly type: string;
    readonly code: string;
  }>;
}

export interface FileFieldProperty extends FieldBase<'FILE'> {
  readonly thumbnailSize?: string;
}

export interface ReferenceTableFieldProperty
  extends FieldBase<'REFERENCE_TABLE'> {
  readonly referenceTable?: ReferenceTableConfig;
}

export interface SubtableFieldProperty extends FieldBase<'SUBTABLE'> {
  readonly fields?: Readonly<Record<string, FieldProperty>>;
}

export interface GroupFieldProperty extends FieldBase<'GROUP'> {
  readonly openGroup?: boolean;
}

/** Platform-managed and layout-only types: base shape only. */
export type BareFieldType =
  | (typeof SYSTEM_FIELD_TYPES)[number]
  | (typeof MANAGED_FIELD_TYPES)[number]
  | (typeof DECORATIVE_FIELD_TYPES)[number];

export type BareFieldProperty = FieldBase<BareFieldType>;

export type FieldProperty =
  | TextFieldProperty
  | RichTextFieldProperty
  | NumberFieldProperty
  | CalcFieldProperty
  | ChoiceFieldProperty
  | DateTimeFieldProperty
  | LinkFieldProperty
  | MemberSelectFieldProperty
  | FileFieldProperty
  | ReferenceTableFieldProperty
  | SubtableFieldProperty
  | GroupFieldProperty
  | BareFieldProperty;

export type FieldPropertyMap = Readonly<Record<string, FieldProperty>>;

/** Types the platform lets carry a `lookup` payload. */
export const LOOKUP_FIELD_TYPES = ['SINGLE_LINE_TEXT', 'NUMBER', 'LINK'] as const;

export type LookupCapableFieldProperty =
  | TextFieldProperty
  | NumberFieldProperty
  | LinkFieldProperty;

/* =========================
 *   Minimal runtime guards
 * ========================= */

const FIELD_TYPE_TAG_SET: ReadonlySet<string> = new Set(FIELD_TYPE_TAGS);
const CHOICE_FIELD_TYPE_SET: ReadonlySet<string> = new Set(CHOICE_FIELD_TYPES);
const LOOKUP_FIELD_TYPE_SET: ReadonlySet<string> = new Set(LOOKUP_FIELD_TYPES);

export function isFieldTypeTag(value: unknown): value is FieldTypeTag {
  return typeof value === 'string' && FIELD_TYPE_TAG_SET.has(value);
}

export function isChoiceFieldType(value: string): value is ChoiceFieldType {
  return CHOICE_FIELD_TYPE_SET.has(value);
}

export function isUnitPosition(value: unknown): value is UnitPosition {
  return value === 'BEFORE' || value === 'AFTER';
}

/**
 * Narrow unknown to FieldProperty via discriminant + code/label shape.
 * Per-type configuration is checked by the FieldValidator.
 */
export function isFieldProperty(value: unknown): value is FieldProperty {
  if (!isRecord(value)) return false;
  return (
    isFieldTypeTag(value.type) &&
    typeof value.code === 'string' &&
    typeof value.label === 'string'
  );
}

export function isLookupCapable(
  field: FieldProperty,
): field is LookupCapableFieldProperty {
  return LOOKUP_FIELD_TYPE_SET.has(field.type);
}

/** A lookup-capable field that carries a `lookup` payload. */
export function isLookupField(
  field: FieldProperty,
): field is LookupCapableFieldProperty & { readonly lookup: LookupConfig } {
  return isLookupCapable(field) && isRecord(field.lookup);
}
