import { IsArray } from 'class-validator';

export class ValidateLayoutRequestDto {
  @IsArray()
  readonly layout!: unknown[];
}
