import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { AppConfigService } from '../app/app-config.service';

@Controller('health')
export class HealthController {
  constructor(private readonly appConfig: AppConfigService) {}

  @Get()
  health(@Res({ passthrough: true }) httpRes: Response) {
    httpRes.setHeader('Cache-Control', 'no-store');
    const now = new Date();
    const gemini = this.appConfig.gemini();

    return {
      data: {
        status: 'ok',
        nowIso: now.toISOString(),
        serverTime: Math.floor(now.getTime() / 1000),
        uptimeSeconds: Math.max(0, Math.floor(process.uptime())),
        service: 'daily-grace-api',
        config: {
          nodeEnv: this.appConfig.nodeEnv(),
          // Without a key every page shows the fallback devotional.
          generatorConfigured: Boolean(gemini),
          model: gemini?.model ?? null,
          timeZone: this.appConfig.devotionalTimeZone(),
        },
      },
    };
  }
}
