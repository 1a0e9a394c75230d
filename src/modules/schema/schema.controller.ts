import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { SchemaValidationError } from '../../lib/errors/SchemaValidationError';
import { ValidationHttpException } from '../../lib/errors/ValidationHttpException';
import { FieldValidator } from './field.validator';
import { LayoutOrganizer } from './layout.organizer';
import { LayoutValidator } from './layout.validator';
import { UnitPositionResolver } from './unit-position.resolver';
import { ValidateFieldRequestDto } from './dto/ValidateField.request.dto';
import { NormalizePropertiesRequestDto } from './dto/NormalizeProperties.request.dto';
import { ValidateLayoutRequestDto } from './dto/ValidateLayout.request.dto';
import { ReconcileLayoutRequestDto } from './dto/ReconcileLayout.request.dto';
import { CorrectWidthsRequestDto } from './dto/CorrectWidths.request.dto';
import { InsertElementRequestDto } from './dto/InsertElement.request.dto';
import { ResolveUnitRequestDto } from './dto/ResolveUnit.request.dto';
import { OrganizeLayoutRequestDto } from './dto/OrganizeLayout.request.dto';
import { RemoveFieldsRequestDto } from './dto/RemoveFields.request.dto';
import { GroupFieldsRequestDto } from './dto/GroupFields.request.dto';
import type {
  AnalyzeLayoutResponseDto,
  CorrectWidthsResponseDto,
  InsertElementResponseDto,
  LayoutEditResponseDto,
  NormalizePropertiesResponseDto,
  ReconcileLayoutResponseDto,
  ResolveUnitResponseDto,
  ValidateFieldResponseDto,
  ValidateLayoutResponseDto,
} from './dto/Schema.response.dto';

@Controller('api/schema')
export class SchemaController {
  constructor(
    private readonly fields: FieldValidator,
    private readonly layouts: LayoutValidator,
    private readonly organizer: LayoutOrganizer,
    private readonly units: UnitPositionResolver,
  ) {}

  /** POST /api/schema/fields/validate */
  @Post('fields/validate')
  @HttpCode(200)
  public validateField(
    @Body() body: ValidateFieldRequestDto,
  ): ValidateFieldResponseDto {
    return guard(() => this.fields.validateUnknown(body.field));
  }

  /** POST /api/schema/fields/normalize */
  @Post('fields/normalize')
  @HttpCode(200)
  public normalizeProperties(
    @Body() body: NormalizePropertiesRequestDto,
  ): NormalizePropertiesResponseDto {
    return guard(() => this.fields.validateProperties(body.properties));
  }

  /** POST /api/schema/layout/validate */
  @Post('layout/validate')
  @HttpCode(200)
  public validateLayout(
    @Body() body: ValidateLayoutRequestDto,
  ): ValidateLayoutResponseDto {
    return guard(() => this.layouts.validate(body.layout));
  }

  /** POST /api/schema/layout/reconcile */
  @Post('layout/reconcile')
  @HttpCode(200)
  public reconcile(
    @Body() body: ReconcileLayoutRequestDto,
  ): ReconcileLayoutResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const fields = this.organizer.readFieldMap(body.fields);
      const result = this.organizer.reconcile(
        checked.layout,
        fields,
        body.autoFix ?? false,
      );
      return {
        layout: result.layout,
        warnings: [...checked.warnings, ...result.warnings],
        missing: result.missing,
      };
    });
  }

  /** POST /api/schema/layout/widths */
  @Post('layout/widths')
  @HttpCode(200)
  public correctWidths(
    @Body() body: CorrectWidthsRequestDto,
  ): CorrectWidthsResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const fields = this.organizer.readFieldMap(body.fields);
      const result = this.organizer.correctWidths(checked.layout, fields);
      return {
        layout: result.layout,
        guidances: [...checked.warnings, ...result.guidances],
      };
    });
  }

  /** POST /api/schema/layout/insert */
  @Post('layout/insert')
  @HttpCode(200)
  public insert(
    @Body() body: InsertElementRequestDto,
  ): InsertElementResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const inserted = this.layouts.validateInsertable(body.element);
      return {
        layout: this.organizer.insertAt(checked.layout, inserted.element, body.position),
        warnings: [...checked.warnings, ...inserted.warnings],
      };
    });
  }

  /** POST /api/schema/layout/organize */
  @Post('layout/organize')
  @HttpCode(200)
  public organize(
    @Body() body: OrganizeLayoutRequestDto,
  ): ReconcileLayoutResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const fields = this.organizer.readFieldMap(body.fields);
      const result = this.organizer.organize(checked.layout, fields, body.fieldsPerRow);
      return { ...result, warnings: [...checked.warnings, ...result.warnings] };
    });
  }

  /** POST /api/schema/layout/remove-fields */
  @Post('layout/remove-fields')
  @HttpCode(200)
  public removeFields(
    @Body() body: RemoveFieldsRequestDto,
  ): LayoutEditResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const result = this.organizer.removeFields(checked.layout, body.codes);
      return { layout: result.layout, warnings: [...checked.warnings, ...result.warnings] };
    });
  }

  /** POST /api/schema/layout/group */
  @Post('layout/group')
  @HttpCode(200)
  public groupFields(
    @Body() body: GroupFieldsRequestDto,
  ): LayoutEditResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      const fields = this.organizer.readFieldMap(body.fields);
      const result = this.organizer.groupFields(checked.layout, fields, body.group);
      return { layout: result.layout, warnings: [...checked.warnings, ...result.warnings] };
    });
  }

  /** POST /api/schema/layout/analyze */
  @Post('layout/analyze')
  @HttpCode(200)
  public analyze(
    @Body() body: ValidateLayoutRequestDto,
  ): AnalyzeLayoutResponseDto {
    return guard(() => {
      const checked = this.layouts.validate(body.layout);
      return this.organizer.analyze(checked.layout);
    });
  }

  /** GET /api/schema/units/resolve?unit=... */
  @Get('units/resolve')
  public resolveUnit(
    @Query() query: ResolveUnitRequestDto,
  ): ResolveUnitResponseDto {
    return { unit: query.unit, position: this.units.resolve(query.unit) };
  }
}

/** Engine failures become 422s; anything else propagates. */
function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof SchemaValidationError) throw new ValidationHttpException(e);
    throw e;
  }
}
