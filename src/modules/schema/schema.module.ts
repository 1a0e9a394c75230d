import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { FieldValidator } from './field.validator';
import { LayoutOrganizer } from './layout.organizer';
import { LayoutValidator } from './layout.validator';
import { SchemaController } from './schema.controller';
import {
  ENV_LOOKUP_MIN_WIDTH,
  ENV_UNIT_PATTERNS_FILE,
  FORM_SCHEMA_CONFIG,
  loadFormSchemaConfig,
  type FormSchemaConfig,
} from './schema.config';
import { UnitPositionResolver } from './unit-position.resolver';

/**
 * Form schema engine.
 * - Providers are stateless; configuration is read once at startup.
 * - Exports the four engine providers for in-process callers.
 */
@Module({})
export class SchemaModule {
  public static forRoot(overrides: Partial<FormSchemaConfig> = {}): DynamicModule {
    return {
      module: SchemaModule,
      imports: [ConfigModule],
      controllers: [SchemaController],
      providers: [
        {
          provide: FORM_SCHEMA_CONFIG,
          inject: [ConfigService],
          useFactory: (config: ConfigService): FormSchemaConfig => ({
            ...loadFormSchemaConfig({
              [ENV_LOOKUP_MIN_WIDTH]: config.get<string>(ENV_LOOKUP_MIN_WIDTH),
              [ENV_UNIT_PATTERNS_FILE]: config.get<string>(ENV_UNIT_PATTERNS_FILE),
            }),
            ...overrides,
          }),
        },
        UnitPositionResolver,
        FieldValidator,
        LayoutValidator,
        LayoutOrganizer,
      ],
      exports: [
        FORM_SCHEMA_CONFIG,
        UnitPositionResolver,
        FieldValidator,
        LayoutValidator,
        LayoutOrganizer,
      ],
    };
  }
}
