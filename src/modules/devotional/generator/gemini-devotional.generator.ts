import { Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';
import type { GeminiConfig } from '../../app/app-config.service';
import type { DevotionalGenerateRequest, DevotionalGenerator } from './devotional-generator';

/** Built by the module factory once an API key is configured. */
export class GeminiDevotionalGenerator implements DevotionalGenerator {
  private readonly logger = new Logger(GeminiDevotionalGenerator.name);
  private readonly client: GoogleGenAI;

  constructor(private readonly cfg: GeminiConfig) {
    this.client = new GoogleGenAI({ apiKey: cfg.apiKey });
  }

  async generate(req: DevotionalGenerateRequest): Promise<string> {
    const startedAt = Date.now();
    const response = await this.client.models.generateContent({
      model: this.cfg.model,
      contents: req.prompt,
      config: {
        systemInstruction: req.systemInstruction,
        responseMimeType: 'application/json',
      },
    });
    this.logger.debug(`generateContent model=${this.cfg.model} (${Date.now() - startedAt}ms)`);
    return response.text ?? '';
  }
}
