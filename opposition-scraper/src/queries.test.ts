import { describe, it, expect } from "vitest";
import { QuerySynthesizer, buildQueryPrompt, fallbackQueries } from "./queries";
import { StubModel } from "./test-helpers";
import { ProjectRecord } from "./types";

const project: ProjectRecord = {
  id: "351",
  name: "100 MW Solar Park",
  location: "Pabna Sadar Upazila, Pabna",
  capacity: "100 MW",
  agency: "BPDB",
  status: "Completed & Running",
};

describe("QuerySynthesizer", () => {
  it("unwraps a fenced json reply", async () => {
    const model = new StubModel(
      () => '```json\n{"english_query": "Pabna solar park land protest", "bangla_query": "পাবনা সৌর পার্ক জমি আন্দোলন"}\n```'
    );
    const pair = await new QuerySynthesizer(model).synthesize(project);
    expect(pair).toEqual({
      englishQuery: "Pabna solar park land protest",
      banglaQuery: "পাবনা সৌর পার্ক জমি আন্দোলন",
    });
  });

  it("embeds every project field in the prompt", () => {
    const prompt = buildQueryPrompt(project);
    expect(prompt).toContain("Project Name: 100 MW Solar Park");
    expect(prompt).toContain("Location: Pabna Sadar Upazila, Pabna");
    expect(prompt).toContain("Capacity: 100 MW");
    expect(prompt).toContain("Agency: BPDB");
    expect(prompt).toContain("Status: Completed & Running");
  });

  it("falls back when the model answers in prose", async () => {
    const pair = await new QuerySynthesizer(new StubModel(() => "I cannot help with that.")).synthesize(project);
    expect(pair).toEqual({
      englishQuery: "100 MW Solar Park Pabna Sadar Upazila, Pabna conflict",
      banglaQuery: "100 MW Solar Park Pabna Sadar Upazila, Pabna সংঘাত",
    });
  });

  it("falls back when a query is blank", async () => {
    const model = new StubModel(() => '{"english_query": "  ", "bangla_query": "x"}');
    expect(await new QuerySynthesizer(model).synthesize(project)).toEqual(fallbackQueries(project));
  });

  it("falls back when the model call throws", async () => {
    const model = new StubModel(() => {
      throw new Error("quota exceeded");
    });
    const pair = await new QuerySynthesizer(model).synthesize(project);
    expect(pair).toEqual(fallbackQueries(project));
    expect(pair.englishQuery.length).toBeGreaterThan(0);
    expect(pair.banglaQuery.length).toBeGreaterThan(0);
  });
});
