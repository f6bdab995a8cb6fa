import 'reflect-metadata';
import { Test } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { AppModule } from '../src/modules/app/app.module';
import { AppConfigService } from '../src/modules/app/app-config.service';
import { configureApp } from '../src/common/configure-app';
import { DEVOTIONAL_GENERATOR } from '../src/modules/devotional/generator/devotional-generator.token';
import type { DevotionalGenerateRequest, DevotionalGenerator } from '../src/modules/devotional/generator/devotional-generator';
import { dayContext } from '../src/common/time/day-context';

const GENERATED =
  '{"daily_verse":"John 3:16","daily_devotional":"God loves","prayer_guide":"Thank you","religious_insight":"Grace"}';

describe('Daily Grace (e2e)', () => {
  let app: NestExpressApplication;
  let calls: DevotionalGenerateRequest[];
  let reply: () => Promise<string>;

  const fakeGenerator: DevotionalGenerator = {
    generate: async (req) => {
      calls.push(req);
      return reply();
    },
  };

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(DEVOTIONAL_GENERATOR)
      .useValue(fakeGenerator)
      .compile();
    app = moduleRef.createNestApplication<NestExpressApplication>({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    calls = [];
    reply = async () => GENERATED;
  });

  it('GET /api/devotional/today returns generated content for a new session', async () => {
    const res = await request(app.getHttpServer()).get('/api/devotional/today').expect(200);

    expect(res.headers['x-request-id']).toBeTruthy();
    expect(res.headers['cache-control']).toBe('no-store');
    expect(res.body.data.source).toBe('generated');
    expect(res.body.data.fallbackReason).toBeNull();
    expect(res.body.data.content).toEqual({
      daily_verse: 'John 3:16',
      daily_devotional: 'God loves',
      prayer_guide: 'Thank you',
      religious_insight: 'Grace',
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.prompt).toContain('general Christian audience');
  });

  it('falls back with today in the insight when the model fails', async () => {
    reply = async () => {
      throw new Error('network down');
    };
    const tz = app.get(AppConfigService).devotionalTimeZone();

    const res = await request(app.getHttpServer()).get('/api/devotional/today').expect(200);
    const day = dayContext(new Date(), tz);

    expect(res.body.data.source).toBe('fallback');
    expect(res.body.data.fallbackReason).toBe('upstream_error');
    expect(res.body.data.content.religious_insight).toContain(`Today is ${day.weekday}, ${day.dateKey}.`);
  });

  it('saved JSON preferences shape the next prompt for that session only', async () => {
    const agent = request.agent(app.getHttpServer());

    const saved = await agent
      .put('/api/preferences')
      .send({ denomination: 'Baptist', bibleVersion: 'ESV custom', themes: ['Hope', 'Nonsense', 'Faith'] })
      .expect(200);
    expect(saved.body.data).toEqual({ denomination: 'Baptist', bibleVersion: 'ESV custom', themes: ['Hope', 'Faith'] });

    await agent.get('/api/devotional/today').expect(200);
    expect(calls[0]?.prompt).toContain(
      'for a Baptist Christian using ESV custom, focusing on themes: Hope, Faith.',
    );

    const other = await request(app.getHttpServer()).get('/api/preferences').expect(200);
    expect(other.body.data).toEqual({ denomination: null, bibleVersion: null, themes: [] });
  });

  it('rejects an invalid preferences body with a 400 envelope', async () => {
    const res = await request(app.getHttpServer()).put('/api/preferences').send({ themes: 'Love' }).expect(400);
    expect(res.body.meta.status).toBe(400);
    expect(res.body.meta.errors[0].reason).toBe('themes');
    expect(res.body.meta.requestId).toBe(res.headers['x-request-id']);
  });

  it('form save redirects and the page reflects it', async () => {
    const agent = request.agent(app.getHttpServer());

    const posted = await agent
      .post('/preferences')
      .type('form')
      .send({ denomination: 'Other', denominationOther: 'Coptic', bibleVersion: 'King James Version (KJV)', themes: 'Love' })
      .expect(303);
    expect(posted.headers.location).toBe('/?saved=1');

    const prefs = await agent.get('/api/preferences').expect(200);
    expect(prefs.body.data).toEqual({ denomination: 'Coptic', bibleVersion: 'King James Version (KJV)', themes: ['Love'] });

    const page = await agent.get('/?saved=1').expect(200);
    expect(page.headers['content-type']).toContain('text/html');
    expect(page.text).toContain('<h1>Daily Grace</h1>');
    expect(page.text).toContain('<section><h2>📖 Daily Bible Verse</h2><p>John 3:16</p></section>');
    expect(page.text).toContain('Preferences saved! Refresh the app to see personalized content.');
    expect(page.text).toContain('value="Coptic"');
    expect(calls[0]?.prompt).toContain('for a Coptic Christian using King James Version (KJV), focusing on themes: Love.');
  });

  it('stores long free text from both save paths unchanged', async () => {
    const version = 'V'.repeat(201);
    const saved = await request(app.getHttpServer())
      .put('/api/preferences')
      .send({ denomination: null, bibleVersion: version, themes: [] })
      .expect(200);
    expect(saved.body.data.bibleVersion).toBe(version);

    const agent = request.agent(app.getHttpServer());
    const denomination = 'A'.repeat(250);
    await agent
      .post('/preferences')
      .type('form')
      .send({ denomination: 'Other', denominationOther: denomination, bibleVersion: 'The Message (MSG)' })
      .expect(303);
    const prefs = await agent.get('/api/preferences').expect(200);
    expect(prefs.body.data.denomination).toBe(denomination);
  });

  it('serves no API docs route', async () => {
    const res = await request(app.getHttpServer()).get('/docs').expect(404);
    expect(res.body.meta.status).toBe(404);
  });

  it('GET /api/preferences/options lists the fixed choices', async () => {
    const res = await request(app.getHttpServer()).get('/api/preferences/options').expect(200);
    expect(res.body.data.denominations).toHaveLength(10);
    expect(res.body.data.bibleVersions).toHaveLength(7);
    expect(res.body.data.themes).toHaveLength(20);
    expect(res.body.data.otherValue).toBe('Other');
  });

  it('GET /health reports generator configuration', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);
    expect(res.body.data.status).toBe('ok');
    expect(res.body.data.service).toBe('daily-grace-api');
    expect(typeof res.body.data.config.generatorConfigured).toBe('boolean');
  });
});
