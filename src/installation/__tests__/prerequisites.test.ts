import { describe, it, expect } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  checkGit,
  checkNetworkConnectivity,
  checkVenvSupport,
  isDirectoryEmpty,
} from "../prerequisites.js";
import { PreconditionError } from "../../errors.js";
import { FakeExecutor } from "../../testing/fake-executor.js";
import { makeTempDir } from "../../testing/fixtures.js";

describe("checkGit", () => {
  it("returns the git version line", async () => {
    const fake = new FakeExecutor().on("git --version", { stdout: "git version 2.43.0\n" });

    await expect(checkGit(fake.runner())).resolves.toBe("git version 2.43.0");
  });

  it("fails when git cannot run", async () => {
    const fake = new FakeExecutor().on("git", { exitCode: 127 });

    await expect(checkGit(fake.runner())).rejects.toThrow("Git is not installed. Please install Git to proceed.");
  });
});

describe("checkVenvSupport", () => {
  it("probes the configured interpreter", async () => {
    const fake = new FakeExecutor();

    await checkVenvSupport(fake.runner(), "python3.12");

    expect(fake.lines()).toEqual(["python3.12 -m venv --help"]);
  });

  it("rejects an interpreter without the venv module", async () => {
    const fake = new FakeExecutor().on("python3 -m venv", { exitCode: 1 });

    await expect(checkVenvSupport(fake.runner())).rejects.toBeInstanceOf(PreconditionError);
  });
});

describe("checkNetworkConnectivity", () => {
  it("passes on HTTP 200", async () => {
    const fetchImpl = async () => ({ status: 200 });

    await expect(checkNetworkConnectivity("https://example.test/repo.git", { fetchImpl })).resolves.toBeUndefined();
  });

  it("fails on any other status", async () => {
    const fetchImpl = async () => ({ status: 503 });

    await expect(checkNetworkConnectivity("https://example.test/repo.git", { fetchImpl })).rejects.toThrow(
      "Network connectivity issue. Cannot reach the repository (https://example.test/repo.git returned HTTP 503).",
    );
  });

  it("fails when the request errors", async () => {
    const fetchImpl = async (): Promise<{ status: number }> => {
      throw new Error("getaddrinfo ENOTFOUND example.test");
    };

    await expect(checkNetworkConnectivity("https://example.test/repo.git", { fetchImpl })).rejects.toThrow(
      "Network connectivity issue. Cannot reach the repository (getaddrinfo ENOTFOUND example.test).",
    );
  });

  it("gives up after the timeout", async () => {
    const fetchImpl = (_url: string, init: { signal: AbortSignal }) =>
      new Promise<{ status: number }>((_resolve, reject) => {
        init.signal.addEventListener("abort", () => {
          const err = new Error("aborted");
          err.name = "AbortError";
          reject(err);
        });
      });

    await expect(
      checkNetworkConnectivity("https://example.test/repo.git", { fetchImpl, timeoutMs: 10 }),
    ).rejects.toThrow("Network connectivity issue. Cannot reach the repository (timed out).");
  });
});

describe("isDirectoryEmpty", () => {
  it("sees files and subdirectories", async () => {
    const dir = await makeTempDir();
    try {
      expect(await isDirectoryEmpty(dir)).toBe(true);
      await mkdir(join(dir, "sub"));
      expect(await isDirectoryEmpty(dir)).toBe(false);
      await rm(join(dir, "sub"), { recursive: true });
      await writeFile(join(dir, ".hidden"), "");
      expect(await isDirectoryEmpty(dir)).toBe(false);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
