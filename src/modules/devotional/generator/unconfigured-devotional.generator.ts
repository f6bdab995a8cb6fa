import { Injectable, ServiceUnavailableException } from '@nestjs/common';
import type { DevotionalGenerator } from './devotional-generator';

/** Bound when GEMINI_API_KEY is missing. */
@Injectable()
export class UnconfiguredDevotionalGenerator implements DevotionalGenerator {
  async generate(): Promise<string> {
    throw new ServiceUnavailableException('Devotional generation is not configured (GEMINI_API_KEY is missing).');
  }
}
