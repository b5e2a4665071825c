// src/reference/actsRepository.ts
// Reference dataset of central acts, read from a directory of JSON files.
//
// Each file holds one act: at least { "title": string }, optionally
// "aliases" (other names the act is cited by) and any further fields.
// A missing or unreadable directory is not an error; the repository
// reports itself absent and compliance checks rely on the model's own
// knowledge.

import fs from "fs";
import path from "path";
import { createLogger } from "../observability/logger";
import { isJsonObject, type JsonObject } from "../ai/jsonRepair";

const log = createLogger("reference/acts");

/* ---------- Types ---------- */

export interface ReferenceAct {
  title: string;
  aliases: string[];
  /** File name the act was read from */
  sourceFile: string;
  /** Record as stored on disk */
  record: JsonObject;
}

export type ActsState =
  | { status: "not_loaded" }
  | { status: "loaded"; acts: ReferenceAct[] }
  | { status: "absent"; reason: string };

/* ---------- Parsing ---------- */

function toReferenceAct(raw: unknown, sourceFile: string): ReferenceAct | null {
  if (!isJsonObject(raw)) return null;
  const title = raw.title;
  if (typeof title !== "string" || !title.trim()) return null;

  const aliases = Array.isArray(raw.aliases)
    ? raw.aliases.filter((a): a is string => typeof a === "string" && a.trim().length > 0)
    : [];

  return { title: title.trim(), aliases, sourceFile, record: raw };
}

/* ---------- Repository ---------- */

export class ActsRepository {
  private actsDir: string;
  private state: ActsState = { status: "not_loaded" };

  constructor(actsDir: string) {
    this.actsDir = actsDir;
  }

  getState(): ActsState {
    return this.state;
  }

  /**
   * Read every *.json file in the directory (sorted by name).
   * Files that are not valid JSON or have no title are skipped with a warning.
   * Calling load() again re-reads the directory.
   */
  load(): ActsState {
    if (!fs.existsSync(this.actsDir)) {
      log.warn({ dir: this.actsDir }, "Acts directory not found, continuing without reference acts");
      this.state = { status: "absent", reason: `directory not found: ${this.actsDir}` };
      return this.state;
    }

    let entries: string[];
    try {
      entries = fs.readdirSync(this.actsDir);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ err, dir: this.actsDir }, "Acts directory unreadable, continuing without reference acts");
      this.state = { status: "absent", reason };
      return this.state;
    }

    const files = entries.filter(f => f.endsWith(".json")).sort();

    const acts: ReferenceAct[] = [];
    for (const file of files) {
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(path.join(this.actsDir, file), "utf-8"));
      } catch (err) {
        log.warn({ err, file }, "Skipping unreadable act file");
        continue;
      }

      const act = toReferenceAct(raw, file);
      if (!act) {
        log.warn({ file }, "Skipping act file without a title");
        continue;
      }
      acts.push(act);
    }

    log.info({ dir: this.actsDir, count: acts.length }, "Loaded reference acts");
    this.state = { status: "loaded", acts };
    return this.state;
  }

  /** Loaded acts; loads on first use. Empty when the dataset is absent. */
  list(): ReferenceAct[] {
    if (this.state.status === "not_loaded") this.load();
    return this.state.status === "loaded" ? this.state.acts : [];
  }

  /** Case-insensitive keyword match against the serialized record. */
  search(keyword: string): ReferenceAct[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    return this.list().filter(act =>
      JSON.stringify(act.record).toLowerCase().includes(needle)
    );
  }

  /** Acts whose title or one of whose aliases appears in the text. */
  findMentionedActs(text: string): ReferenceAct[] {
    const haystack = text.toLowerCase();
    return this.list().filter(act =>
      [act.title, ...act.aliases].some(name => haystack.includes(name.toLowerCase()))
    );
  }
}
