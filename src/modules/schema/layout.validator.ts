import { Injectable, Logger } from '@nestjs/common';
import Ajv, { type ValidateFunction } from 'ajv';
import {
  isFieldTypeTag,
  type ElementSize,
  type FieldElement,
  type GroupNode,
  type LayoutElement,
  type LayoutNode,
  type LayoutPosition,
  type RowNode,
  type SubtableNode,
} from '../../lib/form';
import {
  LayoutNodeMissingRequiredCodeError,
  LayoutPositionInvalidError,
  LayoutStructuralViolationError,
  NumericBoundsInvalidError,
} from '../../lib/errors/SchemaValidationError';
import { isArray, isRecord } from '../../lib/types/json';
import { isNonEmptyString } from '../../lib/utils/strings';

export interface LayoutValidationResult {
  readonly layout: LayoutNode[];
  readonly warnings: ReadonlyArray<string>;
}

/** Containment rules, quoted verbatim in error messages. */
export const LAYOUT_RULES = {
  topLevel: 'The top level may contain only ROW, GROUP and SUBTABLE entries',
  groupRowsOnly: 'A GROUP may contain only ROW entries',
  noNestedGroup: 'A GROUP cannot contain another GROUP',
  noSubtableInGroup: 'A GROUP cannot contain a SUBTABLE',
  noSubtableInRow: 'A ROW cannot contain a SUBTABLE; tables sit at the top level',
  groupEntryAlone: 'A ROW that holds a GROUP entry cannot hold anything else',
  subtableFieldsOnly: 'A SUBTABLE may contain only field entries',
} as const;

const GROUP_SHAPE =
  '{ "type": "GROUP", "code": "group_code", "label": "Group", "layout": [{ "type": "ROW", "fields": [] }] }';

const SIZE_KEYS = ['width', 'height', 'innerHeight'] as const;

const POSITION_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    index: { type: 'integer', minimum: 0 },
    after: { type: 'string', minLength: 1 },
    before: { type: 'string', minLength: 1 },
    type: { type: 'string', enum: ['GROUP'] },
    groupCode: { type: 'string', minLength: 1 },
  },
  dependencies: {
    type: ['groupCode'],
    groupCode: ['type'],
  },
} as const;

/**
 * Structural validation of a form layout tree.
 * Unambiguous gaps are filled with a warning; the first violation throws.
 */
@Injectable()
export class LayoutValidator {
  private readonly logger = new Logger(LayoutValidator.name);
  private readonly ajv = new Ajv({ strict: true, allErrors: true });
  private readonly positionGuard: ValidateFunction<LayoutPosition>;

  constructor() {
    this.positionGuard = this.ajv.compile<LayoutPosition>(POSITION_SCHEMA);
  }

  public validate(layout: unknown): LayoutValidationResult {
    if (!isArray(layout)) {
      throw new LayoutStructuralViolationError(
        'A form layout must be an array of ROW, GROUP and SUBTABLE entries',
        { path: 'layout', suggestion: '[{ "type": "ROW", "fields": [] }]' },
      );
    }
    const warnings: string[] = [];
    const nodes = layout.map((raw, i) => this.topNode(raw, `layout[${i}]`, warnings));
    return { layout: nodes, warnings };
  }

  /**
   * Validate one thing to insert: a top-level node (ROW, GROUP with
   * `layout`, SUBTABLE) or a single row entry.
   */
  public validateInsertable(raw: unknown): {
    readonly element: LayoutNode | LayoutElement;
    readonly warnings: ReadonlyArray<string>;
  } {
    const warnings: string[] = [];
    const path = 'element';
    if (
      isRecord(raw) &&
      (raw.type === 'ROW' ||
        raw.type === 'SUBTABLE' ||
        (raw.type === 'GROUP' && 'layout' in raw))
    ) {
      return { element: this.topNode(raw, path, warnings), warnings };
    }
    return { element: this.element(raw, path, warnings), warnings };
  }

  /**
   * Check an insertion position. Absent means "append".
   * At most one of index/after/before; a group target needs both type and groupCode.
   */
  public validatePosition(position: unknown): LayoutPosition {
    if (position === undefined || position === null) return {};
    if (!this.positionGuard(position)) {
      throw new LayoutPositionInvalidError(
        `Invalid insertion position: ${this.ajv.errorsText(this.positionGuard.errors, { dataVar: 'position' })}`,
        {
          path: 'position',
          suggestion: '{ "index": 0 } | { "after": "code" } | { "before": "code" } | { "type": "GROUP", "groupCode": "group_code", "index": 0 }',
        },
      );
    }
    const anchors = [position.index, position.after, position.before].filter(
      (v) => v !== undefined,
    );
    if (anchors.length > 1) {
      throw new LayoutPositionInvalidError(
        'Insertion position may use only one of index, after and before',
        { path: 'position' },
      );
    }
    if (position.type === 'GROUP' && (position.after !== undefined || position.before !== undefined)) {
      throw new LayoutPositionInvalidError(
        'Group insertion takes an index, not after/before',
        { path: 'position' },
      );
    }
    return position;
  }

  /* =========================
   *          Nodes
   * ========================= */

  private topNode(raw: unknown, path: string, warnings: string[]): LayoutNode {
    const node = this.typed(raw, path, 'ROW', warnings);
    switch (node.type) {
      case 'ROW':
        return this.row(node, path, warnings);
      case 'GROUP':
        return this.group(node, path, warnings);
      case 'SUBTABLE':
        return this.subtable(node, path, warnings);
      default: {
        const code = isNonEmptyString(node.code) ? node.code : 'code';
        throw new LayoutStructuralViolationError(
          `${path}: ${LAYOUT_RULES.topLevel}; got ${JSON.stringify(node.type)}`,
          {
            path,
            suggestion: `{ "type": "ROW", "fields": [{ "type": ${JSON.stringify(node.type)}, "code": "${code}" }] }`,
          },
        );
      }
    }
  }

  private row(
    node: Record<string, unknown>,
    path: string,
    warnings: string[],
  ): RowNode {
    const entries = this.list(node.fields, `${path}.fields`, warnings);
    const fields = entries.map((raw, k) =>
      this.element(raw, `${path}.fields[${k}]`, warnings),
    );
    if (fields.length > 1 && fields.some((f) => f.type === 'GROUP')) {
      throw new LayoutStructuralViolationError(
        `${path}: ${LAYOUT_RULES.groupEntryAlone}`,
        { path },
      );
    }
    return { type: 'ROW', fields };
  }

  private group(
    node: Record<string, unknown>,
    path: string,
    warnings: string[],
  ): GroupNode {
    const code = this.requireCode(node, path, 'GROUP');
    if ('fields' in node) {
      throw new LayoutStructuralViolationError(
        `${path}: GROUP "${code}" takes its rows in "layout", not "fields". Shape: ${GROUP_SHAPE}`,
        { path: `${path}.fields`, suggestion: GROUP_SHAPE },
      );
    }

    let openGroup = true;
    if (node.openGroup === undefined) {
      this.warn(warnings, `${path}: GROUP "${code}" has no openGroup; set to true`);
    } else if (typeof node.openGroup === 'boolean') {
      openGroup = node.openGroup;
    } else {
      throw new LayoutStructuralViolationError(
        `${path}: GROUP "${code}" openGroup must be true or false`,
        { path: `${path}.openGroup` },
      );
    }

    const children = this.list(node.layout, `${path}.layout`, warnings);
    const layout = children.map((raw, j) => {
      const childPath = `${path}.layout[${j}]`;
      const child = this.typed(raw, childPath, 'ROW', warnings);
      switch (child.type) {
        case 'ROW':
          return this.row(child, childPath, warnings);
        case 'GROUP':
          throw new LayoutStructuralViolationError(
            `${childPath}: ${LAYOUT_RULES.noNestedGroup} (group "${code}")`,
            { path: childPath },
          );
        case 'SUBTABLE':
          throw new LayoutStructuralViolationError(
            `${childPath}: ${LAYOUT_RULES.noSubtableInGroup} (group "${code}")`,
            { path: childPath },
          );
        default:
          throw new LayoutStructuralViolationError(
            `${childPath}: ${LAYOUT_RULES.groupRowsOnly} (group "${code}"); got ${JSON.stringify(child.type)}`,
            { path: childPath, suggestion: '{ "type": "ROW", "fields": [ ... ] }' },
          );
      }
    });

    return {
      type: 'GROUP',
      code,
      ...(typeof node.label === 'string' ? { label: node.label } : {}),
      openGroup,
      layout,
    };
  }

  private subtable(
    node: Record<string, unknown>,
    path: string,
    warnings: string[],
  ): SubtableNode {
    const code = this.requireCode(node, path, 'SUBTABLE');
    if (node.fields === undefined || node.fields === null) {
      return { type: 'SUBTABLE', code };
    }
    const entries = this.list(node.fields, `${path}.fields`, warnings);
    const fields = entries.map((raw, k): FieldElement => {
      const entryPath = `${path}.fields[${k}]`;
      const element = this.element(raw, entryPath, warnings);
      switch (element.type) {
        case 'LABEL':
        case 'SPACER':
        case 'HR':
        case 'REFERENCE_TABLE':
        case 'GROUP':
          throw new LayoutStructuralViolationError(
            `${entryPath}: ${LAYOUT_RULES.subtableFieldsOnly} (table "${code}"); got ${element.type}`,
            { path: entryPath },
          );
        default:
          return element;
      }
    });
    return { type: 'SUBTABLE', code, fields };
  }

  /* =========================
   *        Row entries
   * ========================= */

  private element(raw: unknown, path: string, warnings: string[]): LayoutElement {
    if (!isRecord(raw)) {
      throw new LayoutStructuralViolationError(`${path}: a row entry must be an object`, {
        path,
      });
    }
    const type = raw.type;
    if (type === undefined || type === null) {
      throw new LayoutStructuralViolationError(
        `${path}: a row entry needs a type (a field type, LABEL, SPACER, HR or REFERENCE_TABLE)`,
        { path: `${path}.type` },
      );
    }
    if (!isFieldTypeTag(type)) {
      throw new LayoutStructuralViolationError(
        `${path}: unknown row entry type ${JSON.stringify(type)}`,
        { path: `${path}.type` },
      );
    }

    const size = this.size(raw.size, `${path}.size`, warnings);
    const sized = size ? { size } : {};

    switch (type) {
      case 'LABEL': {
        const label = isNonEmptyString(raw.label) ? raw.label : undefined;
        const value = isNonEmptyString(raw.value) ? raw.value : undefined;
        if (label === undefined && value === undefined) {
          throw new LayoutStructuralViolationError(
            `${path}: a LABEL entry needs a non-empty label`,
            { path, suggestion: '{ "type": "LABEL", "label": "<div>Notes</div>" }' },
          );
        }
        return {
          type,
          ...(label !== undefined ? { label } : {}),
          ...(value !== undefined ? { value } : {}),
          ...sized,
        };
      }
      case 'SPACER':
      case 'HR':
        return {
          type,
          ...(isNonEmptyString(raw.elementId) ? { elementId: raw.elementId } : {}),
          ...sized,
        };
      case 'SUBTABLE':
        throw new LayoutStructuralViolationError(`${path}: ${LAYOUT_RULES.noSubtableInRow}`, {
          path,
          suggestion: `{ "type": "SUBTABLE", "code": ${JSON.stringify(isNonEmptyString(raw.code) ? raw.code : 'table_code')} }`,
        });
      case 'REFERENCE_TABLE':
        return { type, code: this.requireCode(raw, path, type), ...sized };
      case 'GROUP':
        if ('layout' in raw) {
          throw new LayoutStructuralViolationError(
            `${path}: ${LAYOUT_RULES.topLevel}; move this GROUP out of the row`,
            { path, suggestion: GROUP_SHAPE },
          );
        }
        return { type, code: this.requireCode(raw, path, type), ...sized };
      default:
        return { type, code: this.requireCode(raw, path, type), ...sized };
    }
  }

  /** Reduce `"200px"` to `"200"`; numbers become numeric strings. */
  private size(raw: unknown, path: string, warnings: string[]): ElementSize | undefined {
    if (raw === undefined || raw === null) return undefined;
    if (!isRecord(raw)) {
      throw new NumericBoundsInvalidError(`${path} must be an object`, { path });
    }
    const out: { width?: string; height?: string; innerHeight?: string } = {};
    for (const key of SIZE_KEYS) {
      const value = raw[key];
      if (value === undefined || value === null) continue;
      const keyPath = `${path}.${key}`;
      let numeric: string;
      if (typeof value === 'number') {
        numeric = String(value);
      } else if (typeof value === 'string') {
        numeric = value.replace(/[^0-9.]/g, '');
        if (numeric !== value && numeric !== '') {
          this.warn(warnings, `${keyPath}: "${value}" reduced to "${numeric}"; units are not allowed`);
        }
      } else {
        throw new NumericBoundsInvalidError(`${keyPath} must be a number`, { path: keyPath });
      }
      const n = Number(numeric);
      if (numeric === '' || !Number.isFinite(n) || n <= 0) {
        throw new NumericBoundsInvalidError(
          `${keyPath} must be a positive number, got ${JSON.stringify(value)}`,
          { path: keyPath },
        );
      }
      out[key] = numeric;
    }
    return out;
  }

  /* =========================
   *         Helpers
   * ========================= */

  /** Record with a `type`; an absent type becomes `fallback`, with a warning. */
  private typed(
    raw: unknown,
    path: string,
    fallback: 'ROW',
    warnings: string[],
  ): Record<string, unknown> & { type: unknown } {
    if (!isRecord(raw)) {
      throw new LayoutStructuralViolationError(`${path}: a layout entry must be an object`, {
        path,
      });
    }
    if (raw.type === undefined || raw.type === null) {
      this.warn(warnings, `${path}: missing type; set to "${fallback}"`);
      return { ...raw, type: fallback };
    }
    return { ...raw, type: raw.type };
  }

  /** Array as-is; a missing value becomes `[]` and a single value is wrapped. */
  private list(raw: unknown, path: string, warnings: string[]): ReadonlyArray<unknown> {
    if (raw === undefined || raw === null) {
      this.warn(warnings, `${path}: missing; set to []`);
      return [];
    }
    if (!isArray(raw)) {
      this.warn(warnings, `${path}: not an array; wrapped in one`);
      return [raw];
    }
    return raw;
  }

  private requireCode(node: Record<string, unknown>, path: string, type: string): string {
    if (!isNonEmptyString(node.code)) {
      throw new LayoutNodeMissingRequiredCodeError(
        `${path}: a ${type} entry needs a non-empty code`,
        { path: `${path}.code` },
      );
    }
    return node.code;
  }

  private warn(warnings: string[], message: string): void {
    this.logger.warn(message);
    warnings.push(message);
  }
}
