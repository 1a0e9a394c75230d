/* Response DTOs for the schema endpoints.
 * Plain JSON shapes; field and layout payloads pass through as validated.
 */
import type {
  FieldProperty,
  LayoutNode,
  UnitPosition,
} from '../../../lib/form';

export class ValidateFieldResponseDto {
  readonly field!: FieldProperty;
  readonly warnings!: ReadonlyArray<string>;
}

export class NormalizePropertiesResponseDto {
  readonly properties!: Readonly<Record<string, FieldProperty>>;
  readonly warnings!: ReadonlyArray<string>;
}

export class ValidateLayoutResponseDto {
  readonly layout!: LayoutNode[];
  readonly warnings!: ReadonlyArray<string>;
}

export class ReconcileLayoutResponseDto {
  readonly layout!: LayoutNode[];
  readonly warnings!: ReadonlyArray<string>;
  /** Codes the repaired layout had to add (or, without autoFix, lacks), sorted. */
  readonly missing!: ReadonlyArray<string>;
}

export class CorrectWidthsResponseDto {
  readonly layout!: LayoutNode[];
  readonly guidances!: ReadonlyArray<string>;
}

export class InsertElementResponseDto {
  readonly layout!: LayoutNode[];
  readonly warnings!: ReadonlyArray<string>;
}

export class LayoutEditResponseDto {
  readonly layout!: LayoutNode[];
  readonly warnings!: ReadonlyArray<string>;
}

export class AnalyzeLayoutResponseDto {
  readonly totalElements!: number;
  readonly elementTypes!: Readonly<Record<string, number>>;
  readonly fieldCount!: number;
  readonly groups!: ReadonlyArray<{ code: string; label?: string; fieldCount: number }>;
  readonly subtables!: ReadonlyArray<{ code: string }>;
}

export class ResolveUnitResponseDto {
  readonly unit!: string;
  readonly position!: UnitPosition;
}
