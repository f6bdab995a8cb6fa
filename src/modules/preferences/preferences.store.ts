import { Injectable } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { emptyPreferences, type PreferencesDto } from '../../common/dto/preferences.dto';

type Entry = {
  prefs: PreferencesDto;
  lastAccessMs: number;
};

function copy(prefs: PreferencesDto): PreferencesDto {
  return { denomination: prefs.denomination, bibleVersion: prefs.bibleVersion, themes: [...prefs.themes] };
}

/**
 * Session-scoped preferences, held in process memory only.
 * Lost on restart. Sessions idle past the TTL are dropped, and past the cap the least recently used go first.
 */
@Injectable()
export class PreferencesStore {
  // Insertion order doubles as recency order: every touch re-inserts the entry.
  private readonly bySession = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;

  constructor(appConfig: AppConfigService) {
    this.ttlMs = appConfig.preferencesSessionTtlMs();
    this.maxSessions = appConfig.preferencesMaxSessions();
  }

  load(sessionId: string): PreferencesDto {
    const now = Date.now();
    this.prune(now);
    const entry = this.bySession.get(sessionId);
    if (!entry) return emptyPreferences();
    this.touch(sessionId, entry, now);
    return copy(entry.prefs);
  }

  /** Replaces whatever was saved before (no merge). */
  save(sessionId: string, prefs: PreferencesDto): PreferencesDto {
    const now = Date.now();
    const entry: Entry = { prefs: copy(prefs), lastAccessMs: now };
    this.touch(sessionId, entry, now);
    this.prune(now);
    return copy(entry.prefs);
  }

  private touch(sessionId: string, entry: Entry, now: number): void {
    entry.lastAccessMs = now;
    this.bySession.delete(sessionId);
    this.bySession.set(sessionId, entry);
  }

  /** Oldest first; stops at the first entry that is fresh and within the cap. */
  private prune(now: number): void {
    for (const [id, entry] of this.bySession) {
      const expired = now - entry.lastAccessMs >= this.ttlMs;
      if (!expired && this.bySession.size <= this.maxSessions) break;
      this.bySession.delete(id);
    }
  }
}
