import express, { Express } from "express";
import cors from "cors";
import morgan from "morgan";
import { z } from "zod";
import {
  ArtifactStore,
  ProjectRunner,
  errorMessage,
  isSafeProjectId,
  reportToDoc,
  toProjectRecord,
  verdictToDoc,
} from "opposition-scraper";

const AnalyzeBodySchema = z.object({
  project_id: z.string().trim().min(1, "project_id is required").regex(/^[A-Za-z0-9_-]+$/, "project_id has unsafe characters"),
  project_name: z.string().optional(),
  location: z.string().optional(),
  capacity: z.string().optional(),
  agency: z.string().optional(),
  present_status: z.string().optional(),
});

export type AppDeps = {
  store: ArtifactStore;
  runner: ProjectRunner;
  requestLog?: boolean;
};

export function createApp({ store, runner, requestLog = true }: AppDeps): Express {
  const app = express();
  const running = new Set<string>();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (requestLog) app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "summary-api", dataDir: store.baseDir });
  });

  app.get("/api/projects/:id/summary", async (req, res) => {
    const { id } = req.params;
    if (!isSafeProjectId(id)) {
      res.status(400).json({ ok: false, error: "Invalid project id" });
      return;
    }
    try {
      const verdict = await store.readVerdict(id);
      if (!verdict) {
        res.status(404).json({ ok: false, error: `No summary for project ${id}` });
        return;
      }
      res.json({ ok: true, summary: verdictToDoc(verdict) });
    } catch (err) {
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.post("/api/analyze", async (req, res) => {
    const parsed = AnalyzeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.flatten() });
      return;
    }

    const project = toProjectRecord(parsed.data);
    if (running.has(project.id)) {
      res.status(409).json({ ok: false, error: `Project ${project.id} is already being analyzed` });
      return;
    }

    running.add(project.id);
    try {
      const report = await runner.run(project);
      res.json({ ok: true, report: reportToDoc(report) });
    } catch (err) {
      res.status(500).json({ ok: false, error: errorMessage(err) });
    } finally {
      running.delete(project.id);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  return app;
}
