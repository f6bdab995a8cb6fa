import type { DayContext } from '../../common/time/day-context';
import { hasAnyPreference, type PreferencesDto } from '../../common/dto/preferences.dto';

/** Sent as the model's system instruction on every request. */
export const DEVOTIONAL_SYSTEM_INSTRUCTION = `
You are an expert in creating comprehensive Christian spiritual content.
Your task is to generate a JSON with these keys:
- daily_verse: A clear, readable Bible verse (not in JSON format). It should also contain the book and verse number
- daily_devotional: A short devotional based on the earlier verse generated (less than 60 words)
- prayer_guide: A prayer based on above generated content (less than 60 words)
- religious_insight: A meaningful insight about Christian tradition or history like saints feast days, liturgical seasons, christian festivals, historical events in christian history, biblical facts, christian symbols with meanings, christian traditions etc.

Ensure the content is:
- Theologically sound
- Personally meaningful
- Culturally sensitive
- Aligned with specific Christian traditions

Avoid:
- Generic content
- Controversial topics
- Repetitive structures

Output MUST be a valid JSON object.
`.trim();

/** Blank text reads as unset; anything else goes into the prompt untouched. */
function orDefault(value: string | null | undefined, fallback: string): string {
  return value != null && value.trim() ? value : fallback;
}

/**
 * Per-request instruction. Preference text is passed through verbatim; unset fields read as generic.
 */
export function buildDevotionalPrompt(day: DayContext, prefs?: PreferencesDto | null): string {
  if (!prefs || !hasAnyPreference(prefs)) {
    return `Generate comprehensive spiritual content for a general Christian audience for ${day.weekday}, ${day.dateKey}.`;
  }

  const denomination = orDefault(prefs.denomination, 'general');
  const bibleVersion = orDefault(prefs.bibleVersion, 'a standard Bible version');
  const themes = prefs.themes.length > 0 ? prefs.themes.join(', ') : 'general spirituality';

  return [
    `Generate comprehensive spiritual content for a ${denomination} Christian`,
    `using ${bibleVersion}, focusing on themes: ${themes}.`,
    `Ensure it is aligned with ${day.weekday}, ${day.dateKey}.`,
  ].join(' ');
}
