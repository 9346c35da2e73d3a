/**
 * Snapshot file — persists a session's context between runs.
 *
 * Writes are atomic (write-tmp-then-rename). A missing file is an empty
 * session; a corrupt one is logged and treated the same way.
 */

import { readFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { SessionSnapshot } from "../schemas/snapshot.js";
import { silentLogger, type Logger } from "../logging/console.js";
import type { ContextState } from "./store.js";

export interface SnapshotFileOptions {
  logger?: Logger;
  now?: () => Date;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SnapshotFile {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(readonly path: string, options: SnapshotFileOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load the saved context.
   *
   * @returns The saved state, or undefined when there is none usable
   */
  async load(): Promise<ContextState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new Error(`Failed to read session snapshot: ${this.path}`, { cause: error });
    }

    try {
      const parsed = SessionSnapshot.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; "));
      }
      return parsed.data.state;
    } catch (error) {
      this.logger.warn("Failed to load session snapshot, starting empty", {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  async save(state: ContextState): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const snapshot: SessionSnapshot = { version: 1, savedAt: this.now().toISOString(), state };
    await writeFileAtomic(this.path, JSON.stringify(snapshot, null, 2), "utf-8");
  }
}
