import { IsArray, IsDefined, IsInt, IsOptional, Max, Min } from 'class-validator';

export class OrganizeLayoutRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  /** The form's current fields, keyed by code or as a list. */
  @IsDefined()
  readonly fields!: unknown;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  readonly fieldsPerRow?: number;
}
