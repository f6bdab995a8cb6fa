import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { SessionId } from '../../common/session-cookie';
import { DevotionalService } from '../devotional/devotional.service';
import { PreferencesStore } from '../preferences/preferences.store';
import { preferencesFormSchema, preferencesFromForm } from '../preferences/preferences-form';
import { renderHomePage } from './home-page';

@Controller()
export class HomeController {
  constructor(
    private readonly devotional: DevotionalService,
    private readonly preferences: PreferencesStore,
  ) {}

  @Get()
  async page(@SessionId() sessionId: string, @Query('saved') saved: string | undefined, @Res() res: Response) {
    const today = await this.devotional.getToday(this.preferences.load(sessionId));
    res.setHeader('Cache-Control', 'no-store');
    res.type('html').send(renderHomePage({ today, saved: saved === '1' }));
  }

  @Post('preferences')
  savePreferences(@SessionId() sessionId: string, @Body() body: unknown, @Res() res: Response) {
    const form = preferencesFormSchema.parse(body);
    this.preferences.save(sessionId, preferencesFromForm(form));
    res.redirect(303, '/?saved=1');
  }
}
