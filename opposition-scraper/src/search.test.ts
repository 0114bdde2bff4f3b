import { describe, it, expect } from "vitest";
import { SearchClient, mergeResultSets, parseSerpHtml, searchUrl } from "./search";
import { fakeHttp, serpEnvelope } from "./test-helpers";

const SERP = `
<div id="search">
  <div class="tF2Cxc">
    <a href="https://example.org/news/solar-protest"><h3>Villagers oppose solar park</h3><cite>example.org</cite></a>
    <div><span>Web</span><span>Residents of the upazila staged a protest over land acquisition.</span></div>
  </div>
  <div class="tF2Cxc">
    <a href="https://example.net/report">Project report</a>
    <span>Images</span>
  </div>
  <div class="tF2Cxc"></div>
</div>`;

function blocks(n: number): string {
  return Array.from(
    { length: n },
    (_, i) => `<div class="tF2Cxc"><a href="https://example.org/${i + 1}"><h3>Result ${i + 1}</h3></a></div>`
  ).join("");
}

describe("parseSerpHtml", () => {
  it("reads link, heading title and the first descriptive span", () => {
    const [first] = parseSerpHtml(SERP);
    expect(first).toEqual({
      title: "Villagers oppose solar park",
      link: "https://example.org/news/solar-protest",
      description: "Residents of the upazila staged a protest over land acquisition.",
      position: 1,
    });
  });

  it("uses anchor text and stripped block text when nothing better exists", () => {
    const second = parseSerpHtml(SERP)[1];
    expect(second).toEqual({
      title: "Project report",
      link: "https://example.net/report",
      description: "Images",
      position: 2,
    });
  });

  it("drops blocks with neither title nor link", () => {
    expect(parseSerpHtml(SERP)).toHaveLength(2);
  });

  it("keeps only the top ten blocks", () => {
    const results = parseSerpHtml(blocks(12));
    expect(results).toHaveLength(10);
    expect(results[9].position).toBe(10);
    expect(results[9].link).toBe("https://example.org/10");
  });

  it("strips search-page boilerplate from descriptions", () => {
    const html = `<div class="tF2Cxc"><a href="https://example.org/x"><h3>T</h3></a>Accessibility help Short snippet</div>`;
    expect(parseSerpHtml(html)[0].description).toBe("Short snippet");
  });

  it("strips every occurrence of boilerplate and title", () => {
    const chrome = `<div class="tF2Cxc"><a href="https://example.org/r"><h3>Report</h3></a>Accessibility help Short snippet Accessibility help</div>`;
    expect(parseSerpHtml(chrome)[0].description).toBe("Short snippet");

    const titled = `<div class="tF2Cxc"><a href="https://example.org/s"><h3>Solar</h3></a> short Solar park Solar</div>`;
    expect(parseSerpHtml(titled)[0].description).toBe("short  park");
  });
});

describe("SearchClient", () => {
  it("posts a SERP request and returns ranked results", async () => {
    const { http, calls } = fakeHttp(() => serpEnvelope(SERP));
    const client = new SearchClient(http, { apiKey: "test-serp-key" });

    const set = await client.search("solar park protest", "en");

    expect(set.totalCount).toBe(2);
    expect(set.language).toBe("en");
    expect(set.queryText).toBe("solar park protest");
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://api.brightdata.com/request");
    expect(calls[0].method).toBe("post");
    expect(calls[0].headers.Authorization).toBe("Bearer test-serp-key");
    expect(JSON.parse(String(calls[0].data))).toEqual({
      zone: "serp",
      url: "https://www.google.com/search?q=solar+park+protest",
      format: "json",
    });
  });

  it("returns an empty set on HTTP 500", async () => {
    const { http } = fakeHttp(() => ({ status: 500, body: "upstream down" }));
    const set = await new SearchClient(http, { apiKey: "test-serp-key" }).search("q", "bn");
    expect(set).toEqual({ results: [], queryText: "q", language: "bn", totalCount: 0 });
  });

  it("returns an empty set for a malformed envelope", async () => {
    const { http } = fakeHttp(() => ({ status: 200, body: "<html>not json</html>" }));
    const set = await new SearchClient(http, { apiKey: "test-serp-key" }).search("q", "en");
    expect(set.totalCount).toBe(0);
  });

  it("returns an empty set when the envelope has no body", async () => {
    const { http } = fakeHttp(() => ({ status: 200, body: JSON.stringify({ status_code: 200 }) }));
    const set = await new SearchClient(http, { apiKey: "test-serp-key" }).search("q", "en");
    expect(set.totalCount).toBe(0);
  });

  it("returns an empty set for empty HTML", async () => {
    const { http } = fakeHttp(() => serpEnvelope(""));
    const set = await new SearchClient(http, { apiKey: "test-serp-key" }).search("q", "en");
    expect(set.totalCount).toBe(0);
    expect(set.results).toEqual([]);
  });

  it("returns an empty set when the transport throws", async () => {
    const { http } = fakeHttp(() => {
      throw new Error("socket hang up");
    });
    const set = await new SearchClient(http, { apiKey: "test-serp-key" }).search("q", "en");
    expect(set.totalCount).toBe(0);
  });
});

describe("mergeResultSets", () => {
  it("concatenates without removing duplicates", () => {
    const r = { title: "t", link: "https://example.org/a", description: "", position: 1 };
    const merged = mergeResultSets(
      { results: [r], queryText: "en q", language: "en", totalCount: 1 },
      { results: [r], queryText: "bn q", language: "bn", totalCount: 1 }
    );
    expect(merged.results).toHaveLength(2);
    expect(merged.totalCount).toBe(2);
    expect(merged.language).toBe("mixed");
    expect(merged.queryText).toBe("English: en q | Bangla: bn q");
  });
});

describe("searchUrl", () => {
  it("form-encodes non-ASCII queries", () => {
    expect(searchUrl("সৌর a&b")).toBe("https://www.google.com/search?q=%E0%A6%B8%E0%A7%8C%E0%A6%B0+a%26b");
  });
});
