import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadConfig } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

describe("loadConfig", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sylvan-config-"));
    path = join(dir, "sylvan.config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should return the defaults when the file is missing", async () => {
    await expect(loadConfig(path)).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("should hand out a fresh copy of the defaults", async () => {
    const config = await loadConfig(path);
    expect(config).not.toBe(DEFAULT_CONFIG);
    config.parser.timeoutMs = 250;
    expect(DEFAULT_CONFIG.parser.timeoutMs).toBe(0);
    expect((await loadConfig(path)).parser.timeoutMs).toBe(0);
  });

  it("should merge given fields over the defaults", async () => {
    writeFileSync(path, JSON.stringify({ parser: { timeoutMs: 500 } }));
    const config = await loadConfig(path);
    expect(config.parser).toEqual({ ...DEFAULT_CONFIG.parser, timeoutMs: 500 });
    expect(config.documents).toEqual(DEFAULT_CONFIG.documents);
  });

  it("should ignore unknown keys", async () => {
    writeFileSync(path, JSON.stringify({ parser: { colour: "red" }, extra: true }));
    await expect(loadConfig(path)).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("should not share section objects with the defaults", async () => {
    writeFileSync(path, "{}");
    const config = await loadConfig(path);
    expect(config.parser).not.toBe(DEFAULT_CONFIG.parser);
  });

  it("should reject malformed JSON", async () => {
    writeFileSync(path, "{");
    const error = await loadConfig(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.message.startsWith("Malformed config: ")).toBe(true);
    expect(error.message.endsWith(` (${path})`)).toBe(true);
    expect(error.path).toBe(path);
  });

  it("should reject a config that is not an object", async () => {
    writeFileSync(path, "[1]");
    await expect(loadConfig(path)).rejects.toThrow(`Config must be a JSON object (${path})`);
  });

  it("should reject a section that is not an object", async () => {
    writeFileSync(path, JSON.stringify({ parser: 3 }));
    await expect(loadConfig(path)).rejects.toThrow(`"parser" must be an object (${path})`);
  });

  it("should reject negative and non-numeric values", async () => {
    writeFileSync(path, JSON.stringify({ documents: { maxDocumentBytes: -1 } }));
    await expect(loadConfig(path)).rejects.toThrow(
      `"documents.maxDocumentBytes" must be a non-negative number (${path})`
    );

    writeFileSync(path, JSON.stringify({ parser: { timeoutMs: "10" } }));
    await expect(loadConfig(path)).rejects.toThrow(`"parser.timeoutMs" must be a non-negative number`);
  });
});
