import { IsDefined } from 'class-validator';

/** Either a map keyed by field code or an array of fields. */
export class NormalizePropertiesRequestDto {
  @IsDefined()
  readonly properties!: unknown;
}
