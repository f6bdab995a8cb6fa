import { Inject, Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { dayContext } from '../../common/time/day-context';
import type { DevotionalTodayDto } from '../../common/dto/devotional.dto';
import type { PreferencesDto } from '../../common/dto/preferences.dto';
import { DEVOTIONAL_GENERATOR } from './generator/devotional-generator.token';
import type { DevotionalGenerator } from './generator/devotional-generator';
import { buildDevotionalPrompt, DEVOTIONAL_SYSTEM_INSTRUCTION } from './devotional-prompt';
import { fallbackResult, parseDevotionalResponse, type ContentResult } from './devotional-response';

@Injectable()
export class DevotionalService {
  private readonly logger = new Logger(DevotionalService.name);

  constructor(
    private readonly appConfig: AppConfigService,
    @Inject(DEVOTIONAL_GENERATOR) private readonly generator: DevotionalGenerator,
  ) {}

  /**
   * Runs prompt -> model -> parse for the given preferences.
   * Always resolves; upstream and parse failures resolve to the fallback record.
   */
  async getToday(prefs: PreferencesDto, now: Date = new Date()): Promise<DevotionalTodayDto> {
    const day = dayContext(now, this.appConfig.devotionalTimeZone());
    const prompt = buildDevotionalPrompt(day, prefs);

    let result: ContentResult;
    try {
      const raw = await this.generator.generate({ systemInstruction: DEVOTIONAL_SYSTEM_INSTRUCTION, prompt });
      result = parseDevotionalResponse(raw, day);
    } catch (err) {
      result = fallbackResult(day, 'upstream_error', (err as Error)?.message ?? String(err));
    }

    if (result.kind === 'fallback') {
      this.logger.warn(
        `[devotional] using fallback content reason=${result.reason}${result.detail ? ` detail=${result.detail}` : ''}`,
      );
    }

    return {
      dateKey: day.dateKey,
      weekday: day.weekday,
      source: result.kind,
      fallbackReason: result.kind === 'fallback' ? result.reason : null,
      content: result.record,
      preferences: { ...prefs, themes: [...prefs.themes] },
    };
  }
}
