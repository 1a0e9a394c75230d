import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DECORATIVE_FIELD_TYPES,
  MANAGED_FIELD_TYPES,
  elementCode,
  isFieldProperty,
  isGroupNode,
  isLayoutNode,
  isLookupField,
  type FieldProperty,
  type FieldPropertyMap,
  type GroupNode,
  type Layout,
  type LayoutElement,
  type LayoutNode,
  type RowNode,
} from '../../lib/form';
import {
  FieldConfigInvalidError,
  LayoutPositionInvalidError,
  LayoutStructuralViolationError,
  NumericBoundsInvalidError,
} from '../../lib/errors/SchemaValidationError';
import { isArray, isRecord } from '../../lib/types/json';
import { toFiniteNumber } from '../../lib/utils/strings';
import { LAYOUT_RULES, LayoutValidator } from './layout.validator';
import { FORM_SCHEMA_CONFIG, type FormSchemaConfig } from './schema.config';

export interface ReconcileResult {
  readonly layout: LayoutNode[];
  readonly warnings: ReadonlyArray<string>;
  /** Codes the layout did not reference, sorted. */
  readonly missing: ReadonlyArray<string>;
}

export interface LayoutEditResult {
  readonly layout: LayoutNode[];
  readonly warnings: ReadonlyArray<string>;
}

export interface FieldGroupRequest {
  readonly code: string;
  readonly label: string;
  /** Fields to move into the group, in display order. */
  readonly fieldCodes: ReadonlyArray<string>;
  readonly fieldsPerRow?: number;
  readonly openGroup?: boolean;
}

export interface GroupSummary {
  readonly code: string;
  readonly label?: string;
  readonly fieldCount: number;
}

export interface LayoutSummary {
  /** Top-level nodes. */
  readonly totalElements: number;
  /** Top-level node count per type. */
  readonly elementTypes: Readonly<Record<string, number>>;
  /** Coded row entries anywhere in the layout. */
  readonly fieldCount: number;
  readonly groups: ReadonlyArray<GroupSummary>;
  readonly subtables: ReadonlyArray<{ readonly code: string }>;
}

const STALE_REASON = 'it is not a field of the form';

export interface WidthCorrectionResult {
  readonly layout: LayoutNode[];
  readonly guidances: ReadonlyArray<string>;
}

type Insertable = LayoutNode | LayoutElement;

/**
 * Keeps a layout in step with the field set of a form.
 * Inputs are never mutated; unchanged branches are shared with the input.
 */
@Injectable()
export class LayoutOrganizer {
  private readonly logger = new Logger(LayoutOrganizer.name);
  private readonly notRequired: ReadonlySet<string>;

  constructor(
    @Inject(FORM_SCHEMA_CONFIG) private readonly config: FormSchemaConfig,
    private readonly validator: LayoutValidator,
  ) {
    this.notRequired = new Set<string>([
      ...config.systemFieldTypes,
      ...MANAGED_FIELD_TYPES,
      ...DECORATIVE_FIELD_TYPES,
      'GROUP',
    ]);
  }

  /**
   * Read a form's field set from a map keyed by code, or from a list.
   * Per-type configuration is not checked here.
   */
  public readFieldMap(input: unknown): FieldPropertyMap {
    if (!isArray(input) && !isRecord(input)) {
      throw new FieldConfigInvalidError(
        'Form fields must be an object keyed by field code, or an array of fields',
        { path: 'fields' },
      );
    }
    const entries: Array<[string, unknown]> = isArray(input)
      ? input.map((v, i): [string, unknown] => [`fields[${i}]`, v])
      : Object.entries(input).map(([k, v]): [string, unknown] => [`fields.${k}`, v]);
    const out: Record<string, FieldProperty> = {};
    for (const [path, value] of entries) {
      if (!isFieldProperty(value)) {
        throw new FieldConfigInvalidError(
          `${path}: expected a field with "type", "code" and "label"`,
          { path },
        );
      }
      out[value.code] = value;
    }
    return out;
  }

  /** Codes referenced by row entries and subtables, group contents included. */
  public extractFieldCodes(layout: Layout): Set<string> {
    const codes = new Set<string>();
    const fromRow = (row: RowNode): void => {
      for (const el of row.fields) {
        if (el.type === 'GROUP') continue;
        const code = elementCode(el);
        if (code !== undefined) codes.add(code);
      }
    };
    for (const node of layout) {
      switch (node.type) {
        case 'ROW':
          fromRow(node);
          break;
        case 'GROUP':
          node.layout.forEach(fromRow);
          break;
        case 'SUBTABLE':
          codes.add(node.code);
          break;
      }
    }
    return codes;
  }

  /** Placeable fields of the form that the layout never references. */
  public findMissing(layout: Layout, allFields: FieldPropertyMap): Set<string> {
    const present = this.extractFieldCodes(layout);
    const missing = new Set<string>();
    for (const field of Object.values(allFields)) {
      if (this.notRequired.has(field.type)) continue;
      if (!present.has(field.code)) missing.add(field.code);
    }
    return missing;
  }

  /**
   * Compare a layout with the form's fields.
   * Without autoFix this only reports. With it, entries whose code is not a
   * field are pruned and every missing field is appended on its own row.
   */
  public reconcile(
    layout: Layout,
    allFields: FieldPropertyMap,
    autoFix = false,
  ): ReconcileResult {
    if (autoFix) return this.repair(layout, allFields, 1);

    const missing = [...this.findMissing(layout, allFields)].sort();
    if (missing.length === 0) {
      return { layout: [...layout], warnings: [], missing };
    }
    const message = `Layout is missing ${missing.length} field(s): ${missing.join(', ')}. Call again with autoFix: true to append them`;
    this.logger.warn(message);
    return { layout: [...layout], warnings: [message], missing };
  }

  /**
   * Same repair as `reconcile` with autoFix, but unplaced fields are packed
   * `fieldsPerRow` to a row. Tables and reference tables keep their own row.
   */
  public organize(
    layout: Layout,
    allFields: FieldPropertyMap,
    fieldsPerRow = 2,
  ): ReconcileResult {
    return this.repair(layout, allFields, assertPerRow(fieldsPerRow, 'fieldsPerRow'));
  }

  /** Drop the given codes; rows and groups left empty go with them. */
  public removeFields(
    layout: Layout,
    codes: ReadonlyArray<string>,
  ): LayoutEditResult {
    const targets = new Set(codes);
    const warnings: string[] = [];
    const present = this.extractFieldCodes(layout);
    const out = this.prune(layout, (code) => targets.has(code), 'removal was requested', warnings);
    for (const code of targets) {
      if (!present.has(code)) {
        this.warn(warnings, `Field "${code}" is not in the layout; nothing to remove`);
      }
    }
    return { layout: out, warnings };
  }

  /**
   * Move fields into a new GROUP appended at the end of the layout.
   * Elements already placed keep their size.
   */
  public groupFields(
    layout: Layout,
    allFields: FieldPropertyMap,
    request: FieldGroupRequest,
  ): LayoutEditResult {
    const perRow = assertPerRow(request.fieldsPerRow ?? 2, 'group.fieldsPerRow');
    const codes = [...new Set(request.fieldCodes)];
    if (codes.length === 0) {
      throw new FieldConfigInvalidError(
        `Group "${request.code}" needs at least one field code`,
        { path: 'group.fieldCodes' },
      );
    }
    if (layout.some((n) => isGroupNode(n) && n.code === request.code)) {
      throw new LayoutStructuralViolationError(
        `Group "${request.code}" already exists in the layout`,
        { path: 'group.code' },
      );
    }

    const byCode = new Map(
      Object.values(allFields).map((f): [string, FieldProperty] => [f.code, f]),
    );
    const placed = this.placedElements(layout);
    const elements = codes.map((code, i): LayoutElement => {
      const path = `group.fieldCodes[${i}]`;
      const field = byCode.get(code);
      if (field === undefined) {
        throw new FieldConfigInvalidError(
          `Field "${code}" is not a field of the form`,
          { path },
        );
      }
      const element = rowElement(field);
      if (element === undefined || field.type === 'GROUP') {
        const rule =
          field.type === 'GROUP'
            ? LAYOUT_RULES.noNestedGroup
            : LAYOUT_RULES.noSubtableInGroup;
        throw new LayoutStructuralViolationError(
          `${rule} (group "${request.code}"); "${code}" is a ${field.type}`,
          { path },
        );
      }
      return placed.get(code) ?? element;
    });

    const warnings: string[] = [];
    const moved = new Set(codes);
    const rest = this.prune(
      layout,
      (code) => moved.has(code),
      `it was moved into group "${request.code}"`,
      warnings,
    );
    const group: GroupNode = {
      type: 'GROUP',
      code: request.code,
      label: request.label,
      openGroup: request.openGroup ?? true,
      layout: chunk(elements, perRow).map((fields): RowNode => ({ type: 'ROW', fields })),
    };
    this.logger.log(`Grouped ${codes.length} field(s) into GROUP "${request.code}"`);
    return { layout: [...rest, group], warnings };
  }

  /** Node counts, groups with their field counts, and subtables. */
  public analyze(layout: Layout): LayoutSummary {
    const elementTypes: Record<string, number> = {};
    const groups: GroupSummary[] = [];
    const subtables: Array<{ code: string }> = [];
    let fieldCount = 0;
    for (const node of layout) {
      elementTypes[node.type] = (elementTypes[node.type] ?? 0) + 1;
      switch (node.type) {
        case 'ROW':
          fieldCount += countCoded(node);
          break;
        case 'GROUP': {
          const inGroup = node.layout.reduce((n, row) => n + countCoded(row), 0);
          fieldCount += inGroup;
          groups.push({
            code: node.code,
            ...(node.label !== undefined ? { label: node.label } : {}),
            fieldCount: inGroup,
          });
          break;
        }
        case 'SUBTABLE':
          subtables.push({ code: node.code });
          break;
      }
    }
    return { totalElements: layout.length, elementTypes, fieldCount, groups, subtables };
  }

  /**
   * Raise element widths to each field's minimum: the configured lookup
   * width for lookup fields, or the field's `_recommendedMinWidth`.
   */
  public correctWidths(
    layout: Layout,
    allFields: FieldPropertyMap,
  ): WidthCorrectionResult {
    const minimums = new Map<string, number>();
    for (const field of Object.values(allFields)) {
      const min = this.minimumWidth(field);
      if (min !== undefined) minimums.set(field.code, min);
    }

    const guidances: string[] = [];
    const fixRow = (row: RowNode): RowNode => {
      let changed = false;
      const fields = row.fields.map((el) => {
        const fixed = this.widen(el, minimums, guidances);
        if (fixed !== el) changed = true;
        return fixed;
      });
      return changed ? { type: 'ROW', fields } : row;
    };

    const out = layout.map((node): LayoutNode => {
      switch (node.type) {
        case 'ROW':
          return fixRow(node);
        case 'GROUP': {
          const rows = node.layout.map(fixRow);
          return rows.some((r, i) => r !== node.layout[i])
            ? { ...node, layout: rows }
            : node;
        }
        case 'SUBTABLE':
          return node;
      }
    });
    return { layout: out, guidances };
  }

  /**
   * Insert a node or row entry.
   * - `{ index }`: top level
   * - `{ type: 'GROUP', groupCode, index? }`: rows of a group
   * - `{ after }` / `{ before }`: next to the first match, depth first
   * - nothing: append at the top level
   */
  public insertAt(
    layout: Layout,
    element: Insertable,
    position?: unknown,
  ): LayoutNode[] {
    const pos = this.validator.validatePosition(position);

    if (pos.type === 'GROUP') {
      const groupCode = pos.groupCode ?? '';
      const index = layout.findIndex(
        (n) => isGroupNode(n) && n.code === groupCode,
      );
      const group = layout[index];
      if (group === undefined || !isGroupNode(group)) {
        throw new LayoutPositionInvalidError(
          `Group "${groupCode}" does not exist in the layout`,
          { path: 'position.groupCode' },
        );
      }
      if (element.type !== 'ROW') {
        throw new LayoutStructuralViolationError(
          `${LAYOUT_RULES.groupRowsOnly}; wrap the ${element.type} entry in a ROW before inserting into group "${groupCode}"`,
          { path: 'element', suggestion: wrapSuggestion(element) },
        );
      }
      const updated: GroupNode = {
        ...group,
        layout: insertInto(group.layout, element, pos.index),
      };
      return replaceAt(layout, index, updated);
    }

    if (pos.after !== undefined || pos.before !== undefined) {
      const target = pos.after ?? pos.before ?? '';
      const offset = pos.after !== undefined ? 1 : 0;
      const result = this.insertRelative(layout, element, target, offset);
      if (!result) {
        throw new LayoutPositionInvalidError(
          `No element with code "${target}" exists in the layout`,
          { path: pos.after !== undefined ? 'position.after' : 'position.before' },
        );
      }
      return result;
    }

    return insertInto(layout, asTopLevel(element), pos.index);
  }

  /* =========================
   *         Internals
   * ========================= */

  private repair(
    layout: Layout,
    allFields: FieldPropertyMap,
    perRow: number,
  ): ReconcileResult {
    const warnings: string[] = [];
    const known = new Set(Object.values(allFields).map((f) => f.code));
    const pruned = this.prune(layout, (code) => !known.has(code), STALE_REASON, warnings);

    // field definition order decides placement; the report is sorted
    const missing = this.findMissing(pruned, allFields);
    const unplaced = Object.values(allFields).filter((f) => missing.has(f.code));
    const out: LayoutNode[] = [...pruned];
    let pending: LayoutElement[] = [];
    const flush = (): void => {
      if (pending.length === 0) return;
      out.push({ type: 'ROW', fields: pending });
      pending = [];
    };
    for (const field of unplaced) {
      const node = appendedNode(field);
      this.warn(
        warnings,
        `Field "${field.code}" was not in the layout; appended as a ${node.type}`,
      );
      if (node.type !== 'ROW' || field.type === 'REFERENCE_TABLE') {
        flush();
        out.push(node);
        continue;
      }
      pending.push(...node.fields);
      if (pending.length >= perRow) flush();
    }
    flush();

    return { layout: out, warnings, missing: [...missing].sort() };
  }

  /**
   * Remove coded entries matching `drop`. Rows and groups emptied by the
   * removal go too; a group is never removed for its own code.
   */
  private prune(
    layout: Layout,
    drop: (code: string) => boolean,
    reason: string,
    warnings: string[],
  ): LayoutNode[] {
    const out: LayoutNode[] = [];
    layout.forEach((node, i) => {
      const path = `layout[${i}]`;
      switch (node.type) {
        case 'ROW': {
          const row = this.pruneRow(node, drop, reason, path, warnings);
          if (row) out.push(row);
          break;
        }
        case 'GROUP': {
          const rows = node.layout.flatMap((row, j) => {
            const kept = this.pruneRow(row, drop, reason, `${path}.layout[${j}]`, warnings);
            return kept ? [kept] : [];
          });
          if (rows.length === 0 && node.layout.length > 0) {
            this.warn(warnings, `${path}: removed GROUP "${node.code}"; nothing was left in it`);
            break;
          }
          const unchanged = rows.length === node.layout.length && rows.every((r, j) => r === node.layout[j]);
          out.push(unchanged ? node : { ...node, layout: rows });
          break;
        }
        case 'SUBTABLE':
          if (drop(node.code)) {
            this.warn(warnings, `${path}: removed SUBTABLE "${node.code}"; ${reason}`);
            break;
          }
          out.push(node);
          break;
      }
    });
    return out;
  }

  private pruneRow(
    row: RowNode,
    drop: (code: string) => boolean,
    reason: string,
    path: string,
    warnings: string[],
  ): RowNode | undefined {
    const fields = row.fields.filter((el) => {
      const code = elementCode(el);
      if (code === undefined || !drop(code)) return true;
      this.warn(warnings, `${path}: removed ${el.type} "${code}"; ${reason}`);
      return false;
    });
    if (fields.length === row.fields.length) return row;
    if (fields.length === 0) {
      this.warn(warnings, `${path}: removed ROW; nothing was left in it`);
      return undefined;
    }
    return { type: 'ROW', fields };
  }

  /** Row entries already in the layout, by code; first occurrence wins. */
  private placedElements(layout: Layout): Map<string, LayoutElement> {
    const placed = new Map<string, LayoutElement>();
    const fromRow = (row: RowNode): void => {
      for (const el of row.fields) {
        const code = elementCode(el);
        if (code !== undefined && !placed.has(code)) placed.set(code, el);
      }
    };
    for (const node of layout) {
      if (node.type === 'ROW') fromRow(node);
      else if (node.type === 'GROUP') node.layout.forEach(fromRow);
    }
    return placed;
  }

  private minimumWidth(field: FieldProperty): number | undefined {
    let min = isLookupField(field) ? this.config.lookupMinWidth : undefined;
    const recommended = toFiniteNumber(field._recommendedMinWidth);
    if (recommended !== undefined && recommended > 0) {
      min = Math.max(min ?? 0, recommended);
    }
    return min;
  }

  private widen(
    el: LayoutElement,
    minimums: ReadonlyMap<string, number>,
    guidances: string[],
  ): LayoutElement {
    const code = elementCode(el);
    const min = code === undefined ? undefined : minimums.get(code);
    if (min === undefined) return el;
    const current = toFiniteNumber(el.size?.width);
    if (current !== undefined && current >= min) return el;

    const message =
      current === undefined
        ? `Field "${code}": width set to ${min}px, the minimum for this field`
        : `Field "${code}": width ${current}px is below the ${min}px minimum; set to ${min}px`;
    this.logger.log(message);
    guidances.push(message);
    return { ...el, size: { ...el.size, width: String(min) } };
  }

  private insertRelative(
    layout: Layout,
    element: Insertable,
    target: string,
    offset: number,
  ): LayoutNode[] | undefined {
    for (let i = 0; i < layout.length; i++) {
      const node = layout[i];
      switch (node.type) {
        case 'ROW':
          if (!rowHas(node, target)) break;
          return isLayoutNode(element)
            ? insertInto(layout, element, i + offset)
            : replaceAt(layout, i, insertInRow(node, element, target, offset));
        case 'SUBTABLE':
          if (node.code === target) {
            return insertInto(layout, asTopLevel(element), i + offset);
          }
          break;
        case 'GROUP': {
          if (node.code === target) {
            return insertInto(layout, asTopLevel(element), i + offset);
          }
          const rows = insertInGroup(node, element, target, offset);
          if (rows) return replaceAt(layout, i, { ...node, layout: rows });
          break;
        }
      }
    }
    return undefined;
  }

  private warn(warnings: string[], message: string): void {
    this.logger.warn(message);
    warnings.push(message);
  }
}

function rowElement(field: FieldProperty): LayoutElement | undefined {
  switch (field.type) {
    case 'SUBTABLE':
      return undefined;
    case 'REFERENCE_TABLE':
      return { type: 'REFERENCE_TABLE', code: field.code };
    case 'LABEL':
      return { type: 'LABEL', label: field.label };
    case 'SPACER':
      return { type: 'SPACER' };
    case 'HR':
      return { type: 'HR' };
    default:
      return { type: field.type, code: field.code };
  }
}

function appendedNode(field: FieldProperty): LayoutNode {
  const element = rowElement(field);
  return element
    ? { type: 'ROW', fields: [element] }
    : { type: 'SUBTABLE', code: field.code };
}

function assertPerRow(value: number, path: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new NumericBoundsInvalidError(
      `${path} must be a positive integer; got ${value}`,
      { path },
    );
  }
  return value;
}

function chunk<T>(items: ReadonlyArray<T>, size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/** Row entries that reference a field; GROUP markers and decorations excluded. */
function countCoded(row: RowNode): number {
  return row.fields.filter((el) => el.type !== 'GROUP' && elementCode(el) !== undefined).length;
}

function rowHas(row: RowNode, code: string): boolean {
  return row.fields.some((el) => elementCode(el) === code);
}

function insertInRow(
  row: RowNode,
  element: LayoutElement,
  target: string,
  offset: number,
): RowNode {
  const k = row.fields.findIndex((el) => elementCode(el) === target);
  const fields = insertInto(row.fields, element, k + offset);
  if (fields.some((el) => el.type === 'GROUP')) {
    throw new LayoutStructuralViolationError(LAYOUT_RULES.groupEntryAlone, {
      path: 'element',
    });
  }
  return { type: 'ROW', fields };
}

function insertInGroup(
  group: GroupNode,
  element: Insertable,
  target: string,
  offset: number,
): RowNode[] | undefined {
  const j = group.layout.findIndex((row) => rowHas(row, target));
  const row = group.layout[j];
  if (row === undefined) return undefined;
  if (element.type === 'ROW') return insertInto(group.layout, element, j + offset);
  if (isLayoutNode(element)) {
    const rule =
      element.type === 'GROUP'
        ? LAYOUT_RULES.noNestedGroup
        : LAYOUT_RULES.noSubtableInGroup;
    throw new LayoutStructuralViolationError(`${rule} (group "${group.code}")`, {
      path: 'element',
    });
  }
  return replaceAt(group.layout, j, insertInRow(row, element, target, offset));
}

function asTopLevel(element: Insertable): LayoutNode {
  if (isLayoutNode(element)) return element;
  throw new LayoutStructuralViolationError(
    `${LAYOUT_RULES.topLevel}; wrap the ${element.type} entry in a ROW`,
    { path: 'element', suggestion: wrapSuggestion(element) },
  );
}

function wrapSuggestion(element: Insertable): string {
  return JSON.stringify({ type: 'ROW', fields: [element] });
}

/** Copy with `item` at `index`; a missing or out-of-range index appends. */
function insertInto<T>(list: ReadonlyArray<T>, item: T, index?: number): T[] {
  const out = [...list];
  if (index === undefined || index >= out.length) {
    out.push(item);
  } else {
    out.splice(Math.max(index, 0), 0, item);
  }
  return out;
}

function replaceAt<T>(list: ReadonlyArray<T>, index: number, item: T): T[] {
  return list.map((v, i) => (i === index ? item : v));
}
