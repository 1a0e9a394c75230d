import type { FieldTypeTag } from './field.types';

/**
 * Form layout tree.
 * Top level: ROW | GROUP | SUBTABLE nodes. A GROUP holds ROWs only;
 * a ROW holds elements (fields, labels, spacers, rules, reference tables).
 */

/** Widths and heights travel as numeric strings, e.g. `"250"`. */
export interface ElementSize {
  readonly width?: string;
  readonly height?: string;
  readonly innerHeight?: string;
}

/**
 * Types that appear as a plain field element inside a ROW.
 * A GROUP entry is legal only as the sole entry of its row.
 */
export type PlainElementType = Exclude<
  FieldTypeTag,
  'LABEL' | 'SPACER' | 'HR' | 'REFERENCE_TABLE' | 'SUBTABLE'
>;

export interface FieldElement {
  readonly type: PlainElementType;
  readonly code: string;
  readonly size?: ElementSize;
}

export interface LabelElement {
  readonly type: 'LABEL';
  /** HTML fragment shown on the form. */
  readonly label?: string;
  readonly value?: string;
  readonly size?: ElementSize;
}

export interface SpacerElement {
  readonly type: 'SPACER';
  readonly elementId?: string;
  readonly size?: ElementSize;
}

export interface HrElement {
  readonly type: 'HR';
  readonly elementId?: string;
  readonly size?: ElementSize;
}

export interface ReferenceTableElement {
  readonly type: 'REFERENCE_TABLE';
  readonly code: string;
  readonly size?: ElementSize;
}

export type LayoutElement =
  | FieldElement
  | LabelElement
  | SpacerElement
  | HrElement
  | ReferenceTableElement;

export interface RowNode {
  readonly type: 'ROW';
  readonly fields: ReadonlyArray<LayoutElement>;
}

export interface GroupNode {
  readonly type: 'GROUP';
  readonly code: string;
  readonly label?: string;
  readonly openGroup?: boolean;
  readonly layout: ReadonlyArray<RowNode>;
}

export interface SubtableNode {
  readonly type: 'SUBTABLE';
  readonly code: string;
  readonly fields?: ReadonlyArray<FieldElement>;
}

export type LayoutNode = RowNode | GroupNode | SubtableNode;

export type Layout = ReadonlyArray<LayoutNode>;

/**
 * Where to insert into a layout. At most one of `index` / `after` / `before`;
 * `type: 'GROUP'` + `groupCode` targets the rows of that group.
 */
export interface LayoutPosition {
  readonly index?: number;
  readonly after?: string;
  readonly before?: string;
  readonly type?: 'GROUP';
  readonly groupCode?: string;
}

/** GROUP is a node only when it carries `layout`; otherwise it is a row entry. */
export function isLayoutNode(
  value: LayoutNode | LayoutElement,
): value is LayoutNode {
  if (value.type === 'ROW' || value.type === 'SUBTABLE') return true;
  return value.type === 'GROUP' && 'layout' in value;
}

export function isRowNode(node: LayoutNode): node is RowNode {
  return node.type === 'ROW';
}

export function isGroupNode(node: LayoutNode): node is GroupNode {
  return node.type === 'GROUP';
}

export function isSubtableNode(node: LayoutNode): node is SubtableNode {
  return node.type === 'SUBTABLE';
}

/** Code an element refers to, if any (labels, spacers and rules have none). */
export function elementCode(element: LayoutElement): string | undefined {
  switch (element.type) {
    case 'LABEL':
    case 'SPACER':
    case 'HR':
      return undefined;
    default:
      return element.code;
  }
}
