import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { PreferencesController } from './preferences.controller';
import { PreferencesStore } from './preferences.store';

@Module({
  imports: [AppConfigModule],
  controllers: [PreferencesController],
  providers: [PreferencesStore],
  exports: [PreferencesStore],
})
export class PreferencesModule {}
