import { IsArray, IsObject, IsOptional } from 'class-validator';

export class InsertElementRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  /** A ROW, GROUP or SUBTABLE node, or a single row entry. */
  @IsObject()
  readonly element!: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  readonly position?: Record<string, unknown>;
}
