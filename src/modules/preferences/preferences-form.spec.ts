import { preferencesBodySchema, preferencesFormSchema, preferencesFromBody, preferencesFromForm } from './preferences-form';

describe('preferencesFromForm', () => {
  it('uses the selected options and a single checked theme', () => {
    const form = preferencesFormSchema.parse({
      denomination: 'Orthodox',
      denominationOther: 'ignored',
      bibleVersion: 'English Standard Version (ESV)',
      themes: 'Courage',
    });
    expect(preferencesFromForm(form)).toEqual({
      denomination: 'Orthodox',
      bibleVersion: 'English Standard Version (ESV)',
      themes: ['Courage'],
    });
  });

  it('takes the free-text field when "Other" is selected', () => {
    const form = preferencesFormSchema.parse({
      denomination: 'Other',
      denominationOther: '  Coptic ',
      bibleVersion: 'Other',
      bibleVersionOther: '',
    });
    expect(preferencesFromForm(form)).toEqual({ denomination: 'Coptic', bibleVersion: null, themes: [] });
  });

  it('accepts long free text without a length cap', () => {
    const longName = 'A'.repeat(250);
    const form = preferencesFormSchema.parse({ denomination: 'Other', denominationOther: longName });
    expect(preferencesFromForm(form).denomination).toBe(longName);
  });

  it('drops unknown themes and keeps list order', () => {
    const form = preferencesFormSchema.parse({ themes: ['Wisdom', 'Dragons', 'Hope', 'Wisdom'] });
    expect(preferencesFromForm(form).themes).toEqual(['Hope', 'Wisdom']);
  });
});

describe('preferencesFromBody', () => {
  it('stores blank text as null and passes other text through', () => {
    const body = preferencesBodySchema.parse({ denomination: ' ', bibleVersion: 'My own paraphrase', themes: ['Love'] });
    expect(preferencesFromBody(body)).toEqual({ denomination: null, bibleVersion: 'My own paraphrase', themes: ['Love'] });
  });

  it('accepts a long bible version', () => {
    const version = 'V'.repeat(201);
    const body = preferencesBodySchema.parse({ bibleVersion: version });
    expect(preferencesFromBody(body)).toEqual({ denomination: null, bibleVersion: version, themes: [] });
  });

  it('rejects a non-array themes value', () => {
    expect(preferencesBodySchema.safeParse({ themes: 'Love' }).success).toBe(false);
  });
});
