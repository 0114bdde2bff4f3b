import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import { ProjectRecord } from "./types";

const UNKNOWN = "Unknown";

function field(row: Record<string, unknown>, key: string): string {
  const v = row[key];
  if (v === undefined || v === null) return UNKNOWN;
  const s = String(v).trim();
  return s || UNKNOWN;
}

/** Maps one scraped row onto a record; absent or blank fields read "Unknown". */
export function toProjectRecord(row: Record<string, unknown>): ProjectRecord {
  return Object.freeze({
    id: field(row, "project_id"),
    name: field(row, "project_name"),
    location: field(row, "location"),
    capacity: field(row, "capacity"),
    agency: field(row, "agency"),
    status: field(row, "present_status"),
  });
}

export function parseProjectsCsv(csv: string): ProjectRecord[] {
  const parsed = Papa.parse<Record<string, unknown>>(csv, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });
  return parsed.data.map(toProjectRecord);
}

export async function loadProjects(path: string): Promise<ProjectRecord[]> {
  return parseProjectsCsv(await readFile(path, "utf-8"));
}
