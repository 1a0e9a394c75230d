import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

export class RemoveFieldsRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  readonly codes!: string[];
}
