import { promises as fs } from "node:fs";
import { ParseError } from "./errors";
import type { ProjectRecord } from "./types";

function isRecord(v: unknown): v is ProjectRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Read the whole project list. Any problem with the file aborts the load;
 * there are no partial results.
 */
export async function loadProjects(p: string): Promise<ProjectRecord[]> {
  let txt: string;
  try {
    txt = await fs.readFile(p, "utf8");
  } catch (e) {
    throw new ParseError(`Cannot read ${p}: ${e instanceof Error ? e.message : String(e)}`, p, e);
  }

  let data: unknown;
  try {
    data = JSON.parse(txt);
  } catch (e) {
    throw new ParseError(`Invalid JSON in ${p}: ${e instanceof Error ? e.message : String(e)}`, p, e);
  }

  if (!Array.isArray(data)) {
    throw new ParseError(`Expected an array of projects in ${p}`, p);
  }

  const projects: ProjectRecord[] = [];
  for (const [i, item] of data.entries()) {
    if (!isRecord(item)) throw new ParseError(`Project ${i} in ${p} is not an object`, p);
    projects.push(item);
  }
  return projects;
}
