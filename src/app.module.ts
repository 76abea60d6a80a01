import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildTypeOrmOptions } from './config/database.config';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './guards/auth.module';
import { JsonLogger } from './logging/json-logger.service';
import { CourseItemsModule } from './modules/course-items/course-items.module';
import { HealthModule } from './modules/health/health.module';
import { SpecializationsModule } from './modules/specializations/specializations.module';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.NODE_ENV === 'production' ? [] : ['.env'],
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
    DatabaseModule,
    AuthModule,
    UsersModule,
    SpecializationsModule,
    CourseItemsModule,
    HealthModule,
  ],
  providers: [JsonLogger],
})
export class AppModule {}
