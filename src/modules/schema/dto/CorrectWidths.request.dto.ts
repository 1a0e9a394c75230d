import { IsArray, IsDefined } from 'class-validator';

export class CorrectWidthsRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  @IsDefined()
  readonly fields!: unknown;
}
