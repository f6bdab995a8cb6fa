import { Module } from '@nestjs/common';
import { DevotionalModule } from '../devotional/devotional.module';
import { PreferencesModule } from '../preferences/preferences.module';
import { HomeController } from './home.controller';

@Module({
  imports: [DevotionalModule, PreferencesModule],
  controllers: [HomeController],
})
export class HomeModule {}
