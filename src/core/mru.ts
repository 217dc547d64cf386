import { readFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import type { MruStore, Window } from "../types.js";
import { PreconditionError, StorageWriteError } from "./errors.js";

const STATE_DIR = process.env.RAISENEXT_STATE_DIR || path.join(homedir(), ".raisenext");
const STATE_FILE = path.join(STATE_DIR, "windows.json");

const windowSchema = z.object({
  id: z.string(),
  desktop: z.string(),
  pid: z.string(),
  wm_class: z.string(),
  machine: z.string(),
  title: z.string(),
});

const snapshotSchema = z.object({
  windows: z.array(windowSchema),
});

function uniqueById(windows: Window[]): Window[] {
  const seen = new Set<string>();
  return windows.filter((w) => {
    if (seen.has(w.id)) return false;
    seen.add(w.id);
    return true;
  });
}

/**
 * Snapshot of the MRU list on disk. Anything that can't be read back as a
 * snapshot (missing file, bad JSON, wrong shape) loads as an empty list.
 */
export function createFileMruStore(file: string = STATE_FILE): MruStore {
  return {
    async load(): Promise<Window[]> {
      let raw: string;
      try {
        raw = await readFile(file, "utf-8");
      } catch {
        return [];
      }
      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch {
        return [];
      }
      const parsed = snapshotSchema.safeParse(data);
      return parsed.success ? uniqueById(parsed.data.windows) : [];
    },

    async save(windows: Window[]): Promise<void> {
      try {
        await mkdir(path.dirname(file), { recursive: true });
        await writeFileAtomic(file, JSON.stringify({ windows }, null, 2) + "\n", {
          encoding: "utf8",
        });
      } catch (error) {
        throw new StorageWriteError(file, error);
      }
    },
  };
}

/**
 * Drop stored windows that have closed, then walk the live list and put each
 * newly opened window in front of the ones before it, so the last one listed
 * ends up first. Known windows keep their stored position but take their live
 * attributes.
 */
export function reconcile(stored: Window[], live: Window[]): Window[] {
  const liveById = new Map(live.map((w) => [w.id, w]));
  const result: Window[] = [];
  for (const w of stored) {
    const current = liveById.get(w.id);
    if (current) result.push(current);
  }

  const known = new Set(result.map((w) => w.id));
  for (const w of live) {
    if (!known.has(w.id)) {
      result.unshift(w);
      known.add(w.id);
    }
  }
  return result;
}

export function promote(windows: Window[], window: Window): Window[] {
  const index = windows.findIndex((w) => w.id === window.id);
  if (index === -1) {
    throw new PreconditionError(`Window ${window.id} is not in the window list`);
  }
  return [windows[index], ...windows.slice(0, index), ...windows.slice(index + 1)];
}

export { STATE_DIR, STATE_FILE };
