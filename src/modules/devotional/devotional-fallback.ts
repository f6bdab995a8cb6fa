import type { DayContext } from '../../common/time/day-context';
import type { ContentRecordDto } from '../../common/dto/devotional.dto';

/** Static record shown whenever generated content is unavailable or unreadable. */
export function fallbackContent(day: DayContext): ContentRecordDto {
  return {
    daily_verse: 'Proverbs 3:5-6 - Trust in the Lord with all your heart and lean not on your own understanding.',
    daily_devotional:
      "In times of uncertainty, remember that faith is your anchor. Reflect on God's unwavering love and guidance.",
    prayer_guide: 'Heavenly Father, guide my steps and fill my heart with your peace today.',
    religious_insight: `Today is ${day.weekday}, ${day.dateKey}. We are reminded of the significance of steadfast faith in navigating life's challenges.`,
  };
}

/** Display-time defaults, used when a field is blank. */
export const CONTENT_FIELD_DEFAULTS: ContentRecordDto = {
  daily_verse: 'No verse available today.',
  daily_devotional: "Today's devotional could not be generated.",
  prayer_guide: 'A simple prayer for guidance.',
  religious_insight: 'Each day is a gift from God.',
};

export function withFieldDefaults(record: Partial<ContentRecordDto> | null | undefined): ContentRecordDto {
  const pick = (key: keyof ContentRecordDto) => {
    const v = record?.[key];
    return typeof v === 'string' && v.trim() ? v : CONTENT_FIELD_DEFAULTS[key];
  };
  return {
    daily_verse: pick('daily_verse'),
    daily_devotional: pick('daily_devotional'),
    prayer_guide: pick('prayer_guide'),
    religious_insight: pick('religious_insight'),
  };
}
