export type DevotionalGenerateRequest = {
  systemInstruction: string;
  prompt: string;
};

/** One outbound model call. Failures reject; no retry. */
export interface DevotionalGenerator {
  generate(req: DevotionalGenerateRequest): Promise<string>;
}
