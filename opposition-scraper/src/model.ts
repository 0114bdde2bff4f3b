import { GoogleGenerativeAI } from "@google/generative-ai";

/** Text-in, text-out model capability; stages receive one instead of reaching for a global client. */
export interface GenerativeModel {
  generate(prompt: string): Promise<string>;
}

export type GeminiOptions = {
  apiKey: string;
  model: string;
  timeoutMs?: number;
};

export class GeminiModel implements GenerativeModel {
  private readonly client: GoogleGenerativeAI;

  constructor(private readonly options: GeminiOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey);
  }

  async generate(prompt: string): Promise<string> {
    const model = this.client.getGenerativeModel(
      { model: this.options.model },
      { timeout: this.options.timeoutMs ?? 30000 }
    );
    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}
