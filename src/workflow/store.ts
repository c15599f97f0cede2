/**
 * StateStore implementations.
 *
 * FILE NAMING CONVENTION:
 * Sessions are saved as: session-{sessionId}.json
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { StateStore } from "../types/capabilities.js";
import { assertSessionId } from "./ids.js";

export class InMemoryStateStore implements StateStore {
  private readonly records = new Map<string, string>();

  async save(sessionId: string, serialized: string): Promise<void> {
    this.records.set(sessionId, serialized);
  }

  async load(sessionId: string): Promise<string | null> {
    return this.records.get(sessionId) ?? null;
  }

  /** IDs of every saved session */
  sessionIds(): string[] {
    return [...this.records.keys()];
  }
}

/**
 * Generate the standard filename for a session.
 */
export function getSessionFilename(sessionId: string): string {
  return `session-${sessionId}.json`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Stores one JSON file per session. Writes go to a temporary file that is
 * then renamed over the previous record.
 */
export class FileStateStore implements StateStore {
  constructor(private readonly directory: string) {}

  pathFor(sessionId: string): string {
    assertSessionId(sessionId);
    return join(this.directory, getSessionFilename(sessionId));
  }

  async save(sessionId: string, serialized: string): Promise<void> {
    const filePath = this.pathFor(sessionId);
    await mkdir(this.directory, { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, serialized, "utf-8");
    await rename(tempPath, filePath);
  }

  async load(sessionId: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(sessionId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      throw err;
    }
  }
}
