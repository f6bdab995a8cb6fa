/** Select value that switches to the free-text field. */
export const OTHER_OPTION = 'Other';

export const DENOMINATION_OPTIONS = [
  'Catholic',
  'Baptist',
  'Methodist',
  'Lutheran',
  'Presbyterian',
  'Pentecostal',
  'Non-denominational',
  'Orthodox',
  'Anglican',
  OTHER_OPTION,
] as const;

export const BIBLE_VERSION_OPTIONS = [
  'New International Version (NIV)',
  'King James Version (KJV)',
  'English Standard Version (ESV)',
  'New Living Translation (NLT)',
  'New American Standard Bible (NASB)',
  'The Message (MSG)',
  OTHER_OPTION,
] as const;

export const THEME_OPTIONS = [
  'Strength',
  'Gratitude',
  'Forgiveness',
  'Love',
  'Hope',
  'Peace',
  'Courage',
  'Wisdom',
  'Joy',
  'Patience',
  'Humility',
  'Compassion',
  'Faith',
  'Mindfulness',
  'Purpose',
  'Healing',
  'Unity',
  'Growth',
  'Generosity',
  'Resilience',
] as const;

export type ThemeOption = (typeof THEME_OPTIONS)[number];

/** Keeps known themes only, deduped, in list order. */
export function normalizeThemes(values: readonly string[]): ThemeOption[] {
  const wanted = new Set(values.map((v) => v.trim()));
  return THEME_OPTIONS.filter((t) => wanted.has(t));
}
