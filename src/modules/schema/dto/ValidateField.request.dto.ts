import { IsObject } from 'class-validator';

/** POST /api/schema/fields/validate. Per-type rules run in the FieldValidator. */
export class ValidateFieldRequestDto {
  @IsObject()
  readonly field!: Record<string, unknown>;
}
