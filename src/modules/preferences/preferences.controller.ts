import { Body, Controller, Get, Put } from '@nestjs/common';
import { SessionId } from '../../common/session-cookie';
import type { PreferenceOptionsDto } from '../../common/dto/preferences.dto';
import { PreferencesStore } from './preferences.store';
import { preferencesBodySchema, preferencesFromBody } from './preferences-form';
import { BIBLE_VERSION_OPTIONS, DENOMINATION_OPTIONS, OTHER_OPTION, THEME_OPTIONS } from './preference-options';

@Controller('api/preferences')
export class PreferencesController {
  constructor(private readonly store: PreferencesStore) {}

  @Get()
  get(@SessionId() sessionId: string) {
    return { data: this.store.load(sessionId) };
  }

  @Put()
  save(@SessionId() sessionId: string, @Body() body: unknown) {
    const parsed = preferencesBodySchema.parse(body);
    return { data: this.store.save(sessionId, preferencesFromBody(parsed)) };
  }

  @Get('options')
  options() {
    const data: PreferenceOptionsDto = {
      denominations: DENOMINATION_OPTIONS,
      bibleVersions: BIBLE_VERSION_OPTIONS,
      themes: THEME_OPTIONS,
      otherValue: OTHER_OPTION,
    };
    return { data };
  }
}
