import { IsArray, IsBoolean, IsDefined, IsOptional } from 'class-validator';

export class ReconcileLayoutRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  /** The form's current fields, keyed by code or as a list. */
  @IsDefined()
  readonly fields!: unknown;

  @IsOptional()
  @IsBoolean()
  readonly autoFix?: boolean;
}
