import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { DevotionalService } from './devotional.service';
import { PreferencesStore } from '../preferences/preferences.store';
import { SessionId } from '../../common/session-cookie';

@Controller('api/devotional')
export class DevotionalController {
  constructor(
    private readonly devotional: DevotionalService,
    private readonly preferences: PreferencesStore,
  ) {}

  @Get('today')
  async today(@SessionId() sessionId: string, @Res({ passthrough: true }) res: Response) {
    const data = await this.devotional.getToday(this.preferences.load(sessionId));
    // Generated per request; never reuse.
    res.setHeader('Cache-Control', 'no-store');
    return { data };
  }
}
