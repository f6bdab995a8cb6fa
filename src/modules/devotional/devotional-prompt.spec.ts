import { buildDevotionalPrompt, DEVOTIONAL_SYSTEM_INSTRUCTION } from './devotional-prompt';
import { emptyPreferences } from '../../common/dto/preferences.dto';

const day = { dateKey: '2026-10-19', weekday: 'Monday' };

describe('buildDevotionalPrompt', () => {
  it('asks for general content when no preference is set', () => {
    const expected = 'Generate comprehensive spiritual content for a general Christian audience for Monday, 2026-10-19.';
    expect(buildDevotionalPrompt(day, emptyPreferences())).toBe(expected);
    expect(buildDevotionalPrompt(day)).toBe(expected);
    expect(buildDevotionalPrompt(day, { denomination: '  ', bibleVersion: null, themes: [] })).toBe(expected);
  });

  it('includes every provided preference verbatim', () => {
    const prompt = buildDevotionalPrompt(day, {
      denomination: 'Catholic',
      bibleVersion: 'King James Version (KJV)',
      themes: ['Hope', 'Peace'],
    });
    expect(prompt).toBe(
      'Generate comprehensive spiritual content for a Catholic Christian using King James Version (KJV), focusing on themes: Hope, Peace. Ensure it is aligned with Monday, 2026-10-19.',
    );
  });

  it('uses generic text for unset fields', () => {
    expect(buildDevotionalPrompt(day, { denomination: null, bibleVersion: null, themes: ['Joy'] })).toBe(
      'Generate comprehensive spiritual content for a general Christian using a standard Bible version, focusing on themes: Joy. Ensure it is aligned with Monday, 2026-10-19.',
    );
    expect(buildDevotionalPrompt(day, { denomination: 'Coptic <Orthodox>', bibleVersion: null, themes: [] })).toBe(
      'Generate comprehensive spiritual content for a Coptic <Orthodox> Christian using a standard Bible version, focusing on themes: general spirituality. Ensure it is aligned with Monday, 2026-10-19.',
    );
  });
});

describe('buildDevotionalPrompt free text', () => {
  it('keeps surrounding whitespace in preference text', () => {
    expect(buildDevotionalPrompt(day, { denomination: ' Coptic ', bibleVersion: 'NRSV  ', themes: [] })).toBe(
      'Generate comprehensive spiritual content for a  Coptic  Christian using NRSV  , focusing on themes: general spirituality. Ensure it is aligned with Monday, 2026-10-19.',
    );
  });
});

describe('DEVOTIONAL_SYSTEM_INSTRUCTION', () => {
  it('names the four JSON keys', () => {
    for (const key of ['daily_verse', 'daily_devotional', 'prayer_guide', 'religious_insight']) {
      expect(DEVOTIONAL_SYSTEM_INSTRUCTION).toContain(`- ${key}:`);
    }
    expect(DEVOTIONAL_SYSTEM_INSTRUCTION.endsWith('Output MUST be a valid JSON object.')).toBe(true);
  });
});
