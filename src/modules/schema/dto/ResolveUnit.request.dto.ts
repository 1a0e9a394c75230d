import { IsString, MaxLength } from 'class-validator';

/** GET /api/schema/units/resolve?unit=... */
export class ResolveUnitRequestDto {
  @IsString()
  @MaxLength(64)
  readonly unit!: string;
}
