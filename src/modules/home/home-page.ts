import type { DevotionalTodayDto } from '../../common/dto/devotional.dto';
import type { PreferencesDto } from '../../common/dto/preferences.dto';
import { withFieldDefaults } from '../devotional/devotional-fallback';
import { BIBLE_VERSION_OPTIONS, DENOMINATION_OPTIONS, OTHER_OPTION, THEME_OPTIONS } from '../preferences/preference-options';

export const SAVED_NOTICE = 'Preferences saved! Refresh the app to see personalized content.';

export function escapeHtml(s: string): string {
  return String(s ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

type SelectState = { selected: string; otherText: string };

/** A saved value outside the list shows as "Other" with the text filled in; unset picks the first option. */
export function selectState(options: readonly string[], value: string | null): SelectState {
  if (!value) return { selected: options[0] ?? OTHER_OPTION, otherText: '' };
  if (value !== OTHER_OPTION && options.includes(value)) return { selected: value, otherText: '' };
  return { selected: OTHER_OPTION, otherText: value === OTHER_OPTION ? '' : value };
}

function renderSelect(params: {
  name: string;
  label: string;
  otherLabel: string;
  options: readonly string[];
  value: string | null;
}): string {
  const state = selectState(params.options, params.value);
  const options = params.options
    .map((o) => `<option value="${escapeHtml(o)}"${o === state.selected ? ' selected' : ''}>${escapeHtml(o)}</option>`)
    .join('');
  return [
    `<label for="${params.name}">${escapeHtml(params.label)}</label>`,
    `<select id="${params.name}" name="${params.name}">${options}</select>`,
    `<label for="${params.name}Other" class="other">${escapeHtml(params.otherLabel)}</label>`,
    `<input id="${params.name}Other" name="${params.name}Other" type="text" value="${escapeHtml(state.otherText)}" />`,
  ].join('\n');
}

function renderThemes(themes: readonly string[]): string {
  const chosen = new Set(themes);
  const boxes = THEME_OPTIONS.map(
    (t) =>
      `<label class="theme"><input type="checkbox" name="themes" value="${escapeHtml(t)}"${chosen.has(t) ? ' checked' : ''} /> ${escapeHtml(t)}</label>`,
  ).join('\n');
  return `<fieldset><legend>Select Your Spiritual Themes</legend>\n${boxes}\n</fieldset>`;
}

function renderSection(heading: string, body: string): string {
  return `<section><h2>${escapeHtml(heading)}</h2><p>${escapeHtml(body)}</p></section>`;
}

export function renderPreferencesForm(prefs: PreferencesDto): string {
  return [
    `<form id="preferences" method="post" action="/preferences">`,
    `<h2>Preferences</h2>`,
    renderSelect({
      name: 'denomination',
      label: 'Select Your Denomination',
      otherLabel: 'Please specify your denomination',
      options: DENOMINATION_OPTIONS,
      value: prefs.denomination,
    }),
    renderSelect({
      name: 'bibleVersion',
      label: 'Preferred Bible Version',
      otherLabel: 'Please specify your preferred Bible version',
      options: BIBLE_VERSION_OPTIONS,
      value: prefs.bibleVersion,
    }),
    renderThemes(prefs.themes),
    `<button type="submit">Save Preferences</button>`,
    `</form>`,
  ].join('\n');
}

export function renderHomePage(params: { today: DevotionalTodayDto; saved: boolean }): string {
  const content = withFieldDefaults(params.today.content);
  const notice = params.saved ? `<p class="notice" role="status">${escapeHtml(SAVED_NOTICE)}</p>` : '';

  return [
    `<!doctype html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="utf-8" />`,
    `<meta name="viewport" content="width=device-width,initial-scale=1" />`,
    `<title>Daily Grace</title>`,
    `<style>body{font-family:-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif;max-width:720px;margin:0 auto;padding:24px;color:#111827;}section{margin-top:16px;padding:14px;border:1px solid #e5e7eb;border-radius:14px;}label{display:block;margin-top:10px;}label.theme{display:inline-block;margin-right:12px;}.notice{color:#065F46;}</style>`,
    `</head>`,
    `<body>`,
    `<h1>Daily Grace</h1>`,
    `<p>Discover inspiration, comfort, and guidance every day with Daily Grace. Begin each day with grace and grow in your walk with God.</p>`,
    notice,
    `<main>`,
    renderSection('📖 Daily Bible Verse', content.daily_verse),
    renderSection('💭 Daily Devotional', content.daily_devotional),
    renderSection('🙏 Prayer Guide', content.prayer_guide),
    renderSection('🕊️ Religious Insight', content.religious_insight),
    `</main>`,
    `<p><a href="#preferences">Customize Your Spiritual Journey →</a></p>`,
    renderPreferencesForm(params.today.preferences),
    `</body>`,
    `</html>`,
  ]
    .filter(Boolean)
    .join('\n');
}
