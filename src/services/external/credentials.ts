/**
 * Credential Material
 * Turns per-request credentials into what yt-dlp reads (a cookie file path or a
 * browser profile) and removes anything written for a single task.
 */

import { mkdir, readdir, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { EngineCredentials } from "../../types/engine.js";
import type { Credentials } from "../../types/task.js";

export const DEFAULT_CREDENTIALS_TEMP_DIR = path.join(os.tmpdir(), "ytdlp-task-cookies");

export interface PreparedCredentials {
  engine: EngineCredentials | undefined;
  /** What was used, for error context. Never the secret itself. */
  description: string;
  release(): Promise<void>;
}

export interface CredentialManagerOptions {
  tempDir?: string;
  /** Cookie file used when a request brings no credentials of its own. */
  defaultCookieFile?: string;
}

export class CredentialManager {
  private readonly tempDir: string;
  private readonly defaultCookieFile: string | undefined;

  constructor(options: CredentialManagerOptions = {}) {
    this.tempDir = options.tempDir ?? DEFAULT_CREDENTIALS_TEMP_DIR;
    this.defaultCookieFile = options.defaultCookieFile;
  }

  async prepare(taskId: string, credentials?: Credentials): Promise<PreparedCredentials> {
    if (!credentials) {
      return this.defaultCookieFile
        ? passThrough({ cookieFile: this.defaultCookieFile }, "default cookie file")
        : passThrough(undefined, "none");
    }

    switch (credentials.kind) {
      case "cookieFile":
        return passThrough({ cookieFile: credentials.path }, "cookie file");
      case "cookiesFromBrowser":
        return passThrough({ cookiesFromBrowser: credentials.profile }, "browser cookies");
      case "cookies":
        return this.writeTransientCookieFile(taskId, credentials.content);
    }
  }

  /** Server-wide credentials, for lookups that are not tied to a task. */
  defaults(): EngineCredentials | undefined {
    return this.defaultCookieFile ? { cookieFile: this.defaultCookieFile } : undefined;
  }

  /**
   * Removes transient cookie files left behind by a crash.
   */
  async cleanupStale(maxAgeHours = 24): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.tempDir);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }

    const cutoff = Date.now() - maxAgeHours * 60 * 60 * 1000;
    let removed = 0;
    for (const entry of entries) {
      const filePath = path.join(this.tempDir, entry);
      const info = await stat(filePath);
      if (info.mtimeMs < cutoff) {
        await rm(filePath, { force: true });
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[cookies] Removed ${removed} stale cookie file(s) from ${this.tempDir}`);
    }
    return removed;
  }

  private async writeTransientCookieFile(taskId: string, content: string): Promise<PreparedCredentials> {
    await mkdir(this.tempDir, { recursive: true, mode: 0o700 });
    const cookieFile = path.join(this.tempDir, `${taskId}.txt`);
    await writeFile(cookieFile, ensureTrailingNewline(content), { encoding: "utf-8", mode: 0o600 });

    return {
      engine: { cookieFile },
      description: "inline cookies",
      release: async () => {
        await rm(cookieFile, { force: true });
      },
    };
  }
}

/**
 * Writes cookie text supplied through the environment to a file once at startup.
 */
export async function writeDefaultCookieFile(content: string, dataDir: string): Promise<string> {
  await mkdir(dataDir, { recursive: true });
  const cookieFile = path.join(dataDir, "cookies.txt");
  await writeFile(cookieFile, ensureTrailingNewline(content), { encoding: "utf-8", mode: 0o600 });
  console.log(`[cookies] ✓ Default cookies written to ${cookieFile}`);
  return cookieFile;
}

function passThrough(engine: EngineCredentials | undefined, description: string): PreparedCredentials {
  return { engine, description, release: async () => {} };
}

function ensureTrailingNewline(content: string): string {
  return content.endsWith("\n") ? content : `${content}\n`;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
