import { existsSync } from "fs";
import { mkdtemp, readFile, rm, stat, utimes, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CredentialManager, writeDefaultCookieFile } from "../../src/services/external/credentials.js";

describe("CredentialManager", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(path.join(os.tmpdir(), "credentials-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses nothing when neither the request nor the server has credentials", async () => {
    const prepared = await new CredentialManager({ tempDir: dir }).prepare("t-1");

    expect(prepared.engine).toBeUndefined();
    expect(prepared.description).toBe("none");
  });

  it("falls back to the server default cookie file", async () => {
    const manager = new CredentialManager({ tempDir: dir, defaultCookieFile: "/data/cookies.txt" });

    const prepared = await manager.prepare("t-1");

    expect(prepared.engine).toEqual({ cookieFile: "/data/cookies.txt" });
    expect(prepared.description).toBe("default cookie file");
    expect(manager.defaults()).toEqual({ cookieFile: "/data/cookies.txt" });
  });

  it("prefers the request's own credentials over the default", async () => {
    const manager = new CredentialManager({ tempDir: dir, defaultCookieFile: "/data/cookies.txt" });

    const prepared = await manager.prepare("t-1", { kind: "cookiesFromBrowser", profile: "chrome" });

    expect(prepared.engine).toEqual({ cookiesFromBrowser: "chrome" });
    expect(prepared.description).toBe("browser cookies");
  });

  it("writes inline cookies to an owner-only file and removes it on release", async () => {
    const prepared = await new CredentialManager({ tempDir: dir }).prepare("t-1", {
      kind: "cookies",
      content: ".example.com\tTRUE\t/\tFALSE\t0\tsession\ttest-secret",
    });
    const cookieFile = path.join(dir, "t-1.txt");

    expect(prepared.engine).toEqual({ cookieFile });
    expect(prepared.description).toBe("inline cookies");
    expect(await readFile(cookieFile, "utf-8")).toBe(".example.com\tTRUE\t/\tFALSE\t0\tsession\ttest-secret\n");
    if (process.platform !== "win32") {
      expect((await stat(cookieFile)).mode & 0o777).toBe(0o600);
    }

    await prepared.release();
    expect(existsSync(cookieFile)).toBe(false);
  });

  it("removes only stale files", async () => {
    const manager = new CredentialManager({ tempDir: dir });
    const stale = path.join(dir, "old.txt");
    const fresh = path.join(dir, "new.txt");
    await writeFile(stale, "x");
    await writeFile(fresh, "y");
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(stale, twoDaysAgo, twoDaysAgo);

    expect(await manager.cleanupStale(24)).toBe(1);
    expect(existsSync(stale)).toBe(false);
    expect(existsSync(fresh)).toBe(true);
  });

  it("treats a missing temp directory as clean", async () => {
    const manager = new CredentialManager({ tempDir: path.join(dir, "does-not-exist") });

    expect(await manager.cleanupStale()).toBe(0);
  });

  it("writes the server default cookies into the data directory", async () => {
    const cookieFile = await writeDefaultCookieFile("# Netscape HTTP Cookie File\n", path.join(dir, "data"));

    expect(cookieFile).toBe(path.join(dir, "data", "cookies.txt"));
    expect(await readFile(cookieFile, "utf-8")).toBe("# Netscape HTTP Cookie File\n");
  });
});
