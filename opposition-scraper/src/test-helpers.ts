import { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from "axios";
import { createHttp } from "./http";
import { GenerativeModel } from "./model";
import { RawContentSink } from "./save";

export type FakeReply = { status: number; body?: string; contentType?: string };

/** In-process axios transport: `route` decides each reply, or throws to simulate a transport failure. */
export function fakeHttp(route: (config: InternalAxiosRequestConfig) => FakeReply): {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = route(config);
    return {
      data: reply.body ?? "",
      status: reply.status,
      statusText: String(reply.status),
      headers: { "content-type": reply.contentType ?? "text/html; charset=utf-8" },
      config,
    };
  };
  return { http: createHttp({ adapter }), calls };
}

export function serpEnvelope(html: string): FakeReply {
  return { status: 200, body: JSON.stringify({ body: html }), contentType: "application/json" };
}

export class StubModel implements GenerativeModel {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => string) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

export class MemorySink implements RawContentSink {
  readonly saved: { projectId: string; index: number; text: string }[] = [];

  async saveRawContent(projectId: string, index: number, text: string) {
    this.saved.push({ projectId, index, text });
    return `${projectId}_${index}.md`;
  }
}
