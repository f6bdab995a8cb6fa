import type { PreferencesDto } from './preferences.dto';

/** The four-field devotional unit. Keys match what the model is asked to return. */
export type ContentRecordDto = {
  daily_verse: string;
  daily_devotional: string;
  prayer_guide: string;
  religious_insight: string;
};

export type ContentSourceDto = 'generated' | 'fallback';

export type FallbackReasonDto = 'upstream_error' | 'empty_response' | 'invalid_json' | 'invalid_shape';

export type DevotionalTodayDto = {
  /** YYYY-MM-DD in the configured devotional time zone. */
  dateKey: string;
  weekday: string;
  source: ContentSourceDto;
  fallbackReason: FallbackReasonDto | null;
  content: ContentRecordDto;
  /** Preferences the prompt was built from. */
  preferences: PreferencesDto;
};
