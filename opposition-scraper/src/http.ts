import axios, { AxiosInstance, CreateAxiosDefaults, isAxiosError } from "axios";
import { DEFAULT_USER_AGENT } from "./constants";
import { UpstreamError } from "./errors";
import { sleep } from "./utils";

export type HttpOptions = {
  timeoutMs?: number;
  userAgent?: string;
  adapter?: CreateAxiosDefaults["adapter"];
};

/**
 * Every pipeline request reads its body as text and decides success from the
 * status itself, so non-2xx answers never throw inside axios.
 */
export function createHttp({ timeoutMs = 30000, userAgent = DEFAULT_USER_AGENT, adapter }: HttpOptions = {}): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout: timeoutMs,
    responseType: "text",
    validateStatus: () => true,
    adapter,
  });
}

export type HtmlResponse = {
  body: string;
  contentType: string;
};

export function readBody(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

export async function getHtml(
  http: AxiosInstance,
  url: string,
  headers: Record<string, string> = {},
  attempt = 1,
  baseDelayMs = 500
): Promise<HtmlResponse> {
  let status: number | undefined;
  try {
    const res = await http.get<unknown>(url, { headers });
    status = res.status;
    if (res.status === 200) {
      const contentType = res.headers["content-type"];
      return { body: readBody(res.data), contentType: typeof contentType === "string" ? contentType : "" };
    }
  } catch (err) {
    if (!isAxiosError(err) || attempt >= 3) throw err;
  }

  if (attempt < 3 && (status === undefined || status >= 500)) {
    await sleep(baseDelayMs * 2 ** (attempt - 1));
    return getHtml(http, url, headers, attempt + 1, baseDelayMs);
  }
  throw new UpstreamError(new URL(url).host, status);
}
