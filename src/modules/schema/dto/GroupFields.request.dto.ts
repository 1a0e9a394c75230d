import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDefined,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class FieldGroupDto {
  @IsString()
  @IsNotEmpty()
  readonly code!: string;

  @IsString()
  readonly label!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  readonly fieldCodes!: string[];

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  readonly fieldsPerRow?: number;

  @IsOptional()
  @IsBoolean()
  readonly openGroup?: boolean;
}

export class GroupFieldsRequestDto {
  @IsArray()
  readonly layout!: unknown[];

  /** The form's current fields, keyed by code or as a list. */
  @IsDefined()
  readonly fields!: unknown;

  @IsDefined()
  @ValidateNested()
  @Type(() => FieldGroupDto)
  readonly group!: FieldGroupDto;
}
