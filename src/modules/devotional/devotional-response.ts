import { z } from 'zod';
import type { DayContext } from '../../common/time/day-context';
import type { ContentRecordDto, FallbackReasonDto } from '../../common/dto/devotional.dto';
import { fallbackContent } from './devotional-fallback';

const contentRecordSchema = z.object({
  daily_verse: z.string(),
  daily_devotional: z.string(),
  prayer_guide: z.string(),
  religious_insight: z.string(),
});

export type ContentResult =
  | { kind: 'generated'; record: ContentRecordDto }
  | { kind: 'fallback'; reason: FallbackReasonDto; record: ContentRecordDto; detail?: string };

export function fallbackResult(day: DayContext, reason: FallbackReasonDto, detail?: string): ContentResult {
  return { kind: 'fallback', reason, record: fallbackContent(day), ...(detail ? { detail } : {}) };
}

/** Removes a leading ```json / ``` fence and a trailing ``` fence. */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('```json')) text = text.slice('```json'.length);
  else if (text.startsWith('```')) text = text.slice('```'.length);
  if (text.endsWith('```')) text = text.slice(0, -'```'.length);
  return text.trim();
}

/** Never throws: anything unreadable becomes the fallback record with a reason. */
export function parseDevotionalResponse(raw: string | null | undefined, day: DayContext): ContentResult {
  const text = stripCodeFence(raw ?? '');
  if (!text) return fallbackResult(day, 'empty_response');

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    return fallbackResult(day, 'invalid_json', (err as Error)?.message ?? String(err));
  }

  const parsed = contentRecordSchema.safeParse(decoded);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return fallbackResult(day, 'invalid_shape', detail);
  }

  const { daily_verse, daily_devotional, prayer_guide, religious_insight } = parsed.data;
  return { kind: 'generated', record: { daily_verse, daily_devotional, prayer_guide, religious_insight } };
}
