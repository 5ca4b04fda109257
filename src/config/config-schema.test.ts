import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { DEFAULT_PROCESS_CONFIG, loadProcessConfig, resolveProcessConfig } from "../types/config.js";

describe("config validation", () => {
  it("accepts valid minimal config", () => {
    const config = resolveProcessConfig({ name: "web", command: "node" });
    expect(config.name).toBe("web");
    expect(config.command).toBe("node");
  });

  it("applies defaults for omitted fields", () => {
    const config = resolveProcessConfig({ name: "web", command: "node" });
    expect(config.args).toEqual(DEFAULT_PROCESS_CONFIG.args);
    expect(config.alwaysRestart).toBe(false);
    expect(config.stdio).toBe("inherit");
    expect(config.logLevel).toBe("info");
    expect(config.cwd).toBeUndefined();
  });

  it("keeps provided values", () => {
    const config = resolveProcessConfig({
      name: "web",
      command: "node",
      args: ["server.js"],
      alwaysRestart: true,
      cwd: "/srv/web",
      env: { PORT: "8080" },
      stdio: "ignore",
      logLevel: "debug",
    });
    expect(config).toEqual({
      name: "web",
      command: "node",
      args: ["server.js"],
      alwaysRestart: true,
      cwd: "/srv/web",
      env: { PORT: "8080" },
      stdio: "ignore",
      logLevel: "debug",
    });
  });

  it("rejects a missing command", () => {
    expect(() => resolveProcessConfig({ name: "web" })).toThrow("Invalid configuration");
  });

  it("rejects an empty name", () => {
    expect(() => resolveProcessConfig({ name: "", command: "node" })).toThrow(ConfigError);
  });

  it("rejects non-string args", () => {
    expect(() => resolveProcessConfig({ name: "web", command: "node", args: [1] })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects non-string env values", () => {
    expect(() =>
      resolveProcessConfig({ name: "web", command: "node", env: { PORT: 8080 } }),
    ).toThrow("Invalid configuration");
  });

  it("rejects unknown stdio modes and log levels", () => {
    expect(() => resolveProcessConfig({ name: "web", command: "node", stdio: "pipe" })).toThrow(
      "Invalid configuration",
    );
    expect(() =>
      resolveProcessConfig({ name: "web", command: "node", logLevel: "trace" }),
    ).toThrow("Invalid configuration");
  });

  it("rejects unknown keys", () => {
    expect(() =>
      resolveProcessConfig({ name: "web", command: "node", restart: "always" }),
    ).toThrow("Invalid configuration");
  });

  it("rejects non-object input", () => {
    expect(() => resolveProcessConfig("node server.js")).toThrow(ConfigError);
  });
});

describe("loadProcessConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "procwarden-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and resolves a JSON file", async () => {
    const path = join(dir, "web.json");
    await writeFile(path, JSON.stringify({ name: "web", command: "node", args: ["a.js"] }));

    const config = await loadProcessConfig(path);

    expect(config.args).toEqual(["a.js"]);
    expect(config.alwaysRestart).toBe(false);
  });

  it("lets defined overrides win over file values", async () => {
    const path = join(dir, "web.json");
    await writeFile(path, JSON.stringify({ name: "web", command: "node", alwaysRestart: false }));

    const config = await loadProcessConfig(path, { alwaysRestart: true, cwd: undefined });

    expect(config.alwaysRestart).toBe(true);
    expect(config.cwd).toBeUndefined();
  });

  it("throws ConfigError for a missing file", async () => {
    await expect(loadProcessConfig(join(dir, "missing.json"))).rejects.toThrow(
      "Cannot read config file",
    );
  });

  it("throws ConfigError for malformed JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ name: web");

    await expect(loadProcessConfig(path)).rejects.toThrow("is not valid JSON");
  });

  it("throws ConfigError when the file holds an array", async () => {
    const path = join(dir, "list.json");
    await writeFile(path, "[]");

    await expect(loadProcessConfig(path)).rejects.toThrow("must contain a JSON object");
  });
});
