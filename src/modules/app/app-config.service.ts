import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type GeminiConfig = {
  apiKey: string;
  model: string;
};

export type SessionCookieConfig = {
  secure: boolean;
};

@Injectable()
export class AppConfigService {
  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = this.config.get<string>('NODE_ENV');
    return raw === 'production' || raw === 'test' ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    const raw = this.config.get<string>('PORT') ?? '3000';
    const n = Number(raw);
    return Number.isFinite(n) ? n : 3000;
  }

  /** Null when no API key is configured (generation then always falls back). */
  gemini(): GeminiConfig | null {
    const apiKey = (this.config.get<string>('GEMINI_API_KEY') ?? '').trim();
    if (!apiKey) return null;
    const model = (this.config.get<string>('GEMINI_MODEL') ?? '').trim() || 'gemini-2.0-flash';
    return { apiKey, model };
  }

  /** IANA zone that decides "today" (date key + weekday). */
  devotionalTimeZone(): string {
    return (this.config.get<string>('DEVOTIONAL_TIME_ZONE') ?? '').trim() || 'America/New_York';
  }

  /** How long an untouched session keeps its preferences (default 12h). */
  preferencesSessionTtlMs(): number {
    const raw = this.config.get<string>('PREFERENCES_SESSION_TTL_MINUTES') ?? '720';
    const n = Number(raw);
    return (Number.isFinite(n) && n > 0 ? n : 720) * 60_000;
  }

  /** Upper bound on sessions held in memory (default 10000). */
  preferencesMaxSessions(): number {
    const raw = this.config.get<string>('PREFERENCES_MAX_SESSIONS') ?? '10000';
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : 10_000;
  }

  sessionCookie(): SessionCookieConfig {
    return { secure: this.readBool('SESSION_COOKIE_SECURE', this.isProd()) };
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  logStartupInfo(): boolean {
    return this.readBool('LOG_STARTUP_INFO', true);
  }
}
