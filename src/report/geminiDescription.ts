import { GoogleGenAI } from "@google/genai";
import type { CaptureOptions, DescriptionService } from "./types";

export type GeminiDescriptionOptions = {
  apiKey: string;
  model: string;
};

export class GeminiDescriptionService implements DescriptionService {
  readonly name = "gemini";
  private readonly ai: GoogleGenAI;

  constructor(private readonly options: GeminiDescriptionOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(prompt: string, options: CaptureOptions): Promise<string> {
    const resp = await this.ai.models.generateContent({
      model: this.options.model,
      contents: prompt,
      config: {
        temperature: 0.4,
        maxOutputTokens: 300,
        httpOptions: { timeout: options.timeoutMs },
      },
    });
    return (resp.text ?? "").trim();
  }
}
