import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { envSchema, validateEnv } from './env';
import { AppConfigModule } from './app-config.module';
import { HealthModule } from '../health/health.module';
import { PreferencesModule } from '../preferences/preferences.module';
import { DevotionalModule } from '../devotional/devotional.module';
import { HomeModule } from '../home/home.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv(envSchema),
    }),
    AppConfigModule,
    HealthModule,
    PreferencesModule,
    DevotionalModule,
    HomeModule,
  ],
})
export class AppModule {}
