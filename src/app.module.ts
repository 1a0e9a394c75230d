// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SchemaModule } from './modules/schema/schema.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), SchemaModule.forRoot()],
})
export class AppModule {}
