import { z } from 'zod';
import type { PreferencesDto } from '../../common/dto/preferences.dto';
import { normalizeThemes, OTHER_OPTION } from './preference-options';

// Free text is accepted as-is; the body parser limit bounds its size.
const text = z.string();

/** JSON body for PUT /api/preferences. */
export const preferencesBodySchema = z.object({
  denomination: text.nullable().optional(),
  bibleVersion: text.nullable().optional(),
  themes: z.array(z.string().max(100)).max(50).optional(),
});

/** urlencoded body posted by the page form; a single checked box arrives as a string. */
export const preferencesFormSchema = z.object({
  denomination: text.optional(),
  denominationOther: text.optional(),
  bibleVersion: text.optional(),
  bibleVersionOther: text.optional(),
  themes: z.union([z.string(), z.array(z.string())]).optional(),
});

export type PreferencesBody = z.infer<typeof preferencesBodySchema>;
export type PreferencesForm = z.infer<typeof preferencesFormSchema>;

function blankToNull(value: string | null | undefined): string | null {
  const v = (value ?? '').trim();
  return v ? v : null;
}

function selectOrOther(selected: string | undefined, other: string | undefined): string | null {
  const choice = blankToNull(selected);
  if (choice === OTHER_OPTION) return blankToNull(other);
  return choice;
}

export function preferencesFromBody(body: PreferencesBody): PreferencesDto {
  return {
    denomination: blankToNull(body.denomination),
    bibleVersion: blankToNull(body.bibleVersion),
    themes: normalizeThemes(body.themes ?? []),
  };
}

export function preferencesFromForm(form: PreferencesForm): PreferencesDto {
  const themes = form.themes == null ? [] : Array.isArray(form.themes) ? form.themes : [form.themes];
  return {
    denomination: selectOrOther(form.denomination, form.denominationOther),
    bibleVersion: selectOrOther(form.bibleVersion, form.bibleVersionOther),
    themes: normalizeThemes(themes),
  };
}
