import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { AppConfigService } from '../app/app-config.service';
import { DevotionalService } from './devotional.service';
import { DevotionalController } from './devotional.controller';
import { DEVOTIONAL_GENERATOR } from './generator/devotional-generator.token';
import type { DevotionalGenerator } from './generator/devotional-generator';
import { GeminiDevotionalGenerator } from './generator/gemini-devotional.generator';
import { UnconfiguredDevotionalGenerator } from './generator/unconfigured-devotional.generator';
import { PreferencesModule } from '../preferences/preferences.module';

@Module({
  imports: [AppConfigModule, PreferencesModule],
  controllers: [DevotionalController],
  providers: [
    DevotionalService,
    {
      provide: DEVOTIONAL_GENERATOR,
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService): DevotionalGenerator => {
        const gemini = cfg.gemini();
        return gemini ? new GeminiDevotionalGenerator(gemini) : new UnconfiguredDevotionalGenerator();
      },
    },
  ],
  exports: [DevotionalService],
})
export class DevotionalModule {}
