export type PreferencesDto = {
  /** Denomination from the option list, or free text. Null means "general". */
  denomination: string | null;
  /** Bible version from the option list, or free text. Null means "a standard Bible version". */
  bibleVersion: string | null;
  /** Theme labels from the fixed list; order carries no meaning. */
  themes: string[];
};

export type PreferenceOptionsDto = {
  denominations: readonly string[];
  bibleVersions: readonly string[];
  themes: readonly string[];
  /** Option value that switches a select to its free-text field. */
  otherValue: string;
};

export function emptyPreferences(): PreferencesDto {
  return { denomination: null, bibleVersion: null, themes: [] };
}

export function hasAnyPreference(prefs: PreferencesDto | null | undefined): boolean {
  if (!prefs) return false;
  return Boolean(prefs.denomination?.trim()) || Boolean(prefs.bibleVersion?.trim()) || prefs.themes.length > 0;
}
