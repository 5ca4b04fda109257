import { constants } from "node:os";
import { describe, expect, it } from "vitest";
import { MockProcessManager } from "./mock-process-manager.js";

const spawnOptions = { command: "worker", args: ["--once"] };

describe("MockProcessManager", () => {
  it("assigns sequential pids and records spawn calls", async () => {
    const pm = new MockProcessManager();

    const first = await pm.spawn(spawnOptions);
    const second = await pm.spawn(spawnOptions);

    expect([first.pid, second.pid]).toEqual([10000, 10001]);
    expect(pm.spawnCalls).toEqual([spawnOptions, spawnOptions]);
    expect(pm.lastProcess?.pid).toBe(10001);
  });

  it("resolves exited once, with the first return code", async () => {
    const pm = new MockProcessManager();
    await pm.spawn(spawnOptions);
    const handle = pm.lastProcess;

    handle?.resolveExit(4);
    handle?.resolveExit(9);

    await expect(handle?.exited).resolves.toBe(4);
    expect(handle && pm.isAlive(handle.pid)).toBe(false);
  });

  it("dies from signals with the negated signal number", async () => {
    const pm = new MockProcessManager();
    const handle = await pm.spawn(spawnOptions);

    expect(handle.signal("SIGTERM", { group: true })).toBe(true);

    await expect(handle.exited).resolves.toBe(-constants.signals.SIGTERM);
    expect(pm.lastProcess?.signalCalls).toEqual([{ signal: "SIGTERM", group: true }]);
  });

  it("survives ignored signals", async () => {
    const pm = new MockProcessManager();
    pm.ignoredSignals.add("SIGTERM");
    const handle = await pm.spawn(spawnOptions);

    expect(handle.signal("SIGTERM")).toBe(true);
    expect(pm.isAlive(handle.pid)).toBe(true);
  });

  it("reports signals to exited processes as undelivered", async () => {
    const pm = new MockProcessManager();
    const handle = await pm.spawn(spawnOptions);
    pm.lastProcess?.resolveExit(0);

    expect(handle.signal("SIGKILL")).toBe(false);
  });

  it("fails only the next spawn", async () => {
    const pm = new MockProcessManager();
    pm.failNextSpawn();

    await expect(pm.spawn(spawnOptions)).rejects.toThrow("Mock spawn failure");
    await expect(pm.spawn(spawnOptions)).resolves.toMatchObject({ pid: 10000 });
  });

  it("holds a spawn until released", async () => {
    const pm = new MockProcessManager();
    const release = pm.holdNextSpawn();

    let spawned = false;
    const pending = pm.spawn(spawnOptions).then(() => {
      spawned = true;
    });
    await Promise.resolve();
    expect(spawned).toBe(false);
    expect(pm.spawnCalls).toHaveLength(1);

    release();
    await pending;
    expect(spawned).toBe(true);
  });

  it("fails a held spawn once it is released", async () => {
    const pm = new MockProcessManager();
    const release = pm.holdNextSpawn();
    pm.failNextSpawn();

    const pending = pm.spawn(spawnOptions);
    release();

    await expect(pending).rejects.toThrow("Mock spawn failure");
    expect(pm.spawnedProcesses).toHaveLength(0);
  });

  it("clear() resets tracking", async () => {
    const pm = new MockProcessManager();
    await pm.spawn(spawnOptions);
    pm.ignoredSignals.add("SIGINT");

    pm.clear();

    expect(pm.spawnCalls).toHaveLength(0);
    expect(pm.lastProcess).toBeUndefined();
    expect(pm.ignoredSignals.size).toBe(0);
  });
});
