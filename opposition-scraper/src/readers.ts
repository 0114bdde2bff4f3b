import { AxiosInstance } from "axios";
import { READER_BASE_URL } from "./constants";
import { UpstreamError } from "./errors";
import { getHtml, readBody } from "./http";
import { partitionDocument } from "./parse";

export interface Extractor {
  readonly name: string;
  /** Returns the raw readable text for `url`, or throws. */
  extract(url: string): Promise<string>;
}

/** Remote reader proxy that renders a page and answers with markdown text. */
export class ReaderExtractor implements Extractor {
  readonly name = "reader";

  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl = READER_BASE_URL
  ) {}

  async extract(url: string): Promise<string> {
    const res = await this.http.get<unknown>(`${this.baseUrl}${url}`, {
      headers: {
        Accept: "text/plain,text/markdown,text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
    });
    if (res.status !== 200) throw new UpstreamError("reader", res.status, `reader returned status ${res.status}`);
    return readBody(res.data);
  }
}

/** Direct fetch of the page, split into text elements locally. */
export class PartitionExtractor implements Extractor {
  readonly name = "partition";

  constructor(
    private readonly http: AxiosInstance,
    private readonly retryDelayMs = 500
  ) {}

  async extract(url: string): Promise<string> {
    const { body, contentType } = await getHtml(
      this.http,
      url,
      {
        "Accept-Language": "en-US,en;q=0.5",
        Connection: "keep-alive",
      },
      1,
      this.retryDelayMs
    );
    return partitionDocument(body, contentType).join("\n");
  }
}
