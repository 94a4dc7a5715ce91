import { EventEmitter } from "node:events";
import process from "node:process";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { tmpfile } from "zx";
import type { IoExpectation } from "../../src/core/io-expectation.js";
import { Runner } from "../../src/lib.js";
import { createSystem } from "../../src/system.js";
import IoTestScript, {
  abortOnSignals,
  IoTestLoop,
} from "../../src/scripts/io-test.js";
import { createHarness } from "../fakes/harness.js";
import { RecordingLogger } from "../fakes/logger.js";
import { FakeStorageStack } from "../fakes/storage-stack.js";

describe("IoTestLoop", () => {
  let stack: FakeStorageStack;
  let output: string[];
  let controller: AbortController;

  beforeEach(() => {
    stack = new FakeStorageStack();
    output = [];
    controller = new AbortController();
  });

  const loop = (expectation: IoExpectation) =>
    new IoTestLoop({
      runner: stack,
      device: stack.mapPath,
      expectation,
      intervalMs: 0,
      probeCommand: "./probe",
      signal: controller.signal,
      write: (text) => output.push(text),
    });

  it("issues a small direct write", async () => {
    await loop("pass").attempt();

    expect(stack.calls).toEqual([
      "sg_dd if=/dev/zero of=/dev/mapper/mpatha bs=512 bpt=8 count=8 oflag=direct,sgio",
    ]);
  });

  it("accepts a passing write when writes should pass", async () => {
    await expect(loop("pass").attempt()).resolves.toBeNull();
    expect(output).toEqual(["."]);
  });

  it("accepts a conflict when writes should fail", async () => {
    stack.lu.registrations.set("peer", 0x1n);
    stack.lu.reservation = { holder: "peer", key: 0x1n, type: 5 };

    await expect(loop("fail").attempt()).resolves.toBeNull();
    expect(output).toEqual(["x"]);
  });

  it("fails when a write succeeds that should have been rejected", async () => {
    await expect(loop("fail").attempt()).resolves.toBe(
      "I/O succeeded but was expected to fail",
    );
  });

  it("fails on a reservation conflict when writes should pass", async () => {
    stack.lu.registrations.set("peer", 0x1n);
    stack.lu.reservation = { holder: "peer", key: 0x1n, type: 5 };

    await expect(loop("pass").attempt()).resolves.toBe(
      "I/O failed with conflict but was expected to pass",
    );
  });

  it("probes the paths after any other write error", async () => {
    stack.failures.set("sg_dd", { exitCode: 5, stdout: "", stderr: "" });
    stack.failures.set("./probe", { exitCode: 0, stdout: "", stderr: "" });

    await expect(loop("pass").attempt()).resolves.toBeNull();
    expect(stack.callsTo("./probe")).toEqual(["./probe /dev/mapper/mpatha"]);
    expect(output).toEqual(["\nI/O failed with 5. checking paths\n", "x"]);
  });

  it("fails when the path probe fails", async () => {
    stack.failures.set("sg_dd", { exitCode: 5, stdout: "", stderr: "" });

    await expect(loop("pass").attempt()).resolves.toBe("probing paths failed");
  });

  it("exits cleanly once asked to stop", async () => {
    const writer = new IoTestLoop({
      runner: stack,
      device: stack.mapPath,
      expectation: "pass",
      intervalMs: 0,
      probeCommand: "./probe",
      signal: controller.signal,
      write: (text) => {
        output.push(text);
        if (text === ".") controller.abort();
      },
    });

    await expect(writer.run()).resolves.toBe(0);
    expect(output).toEqual([
      "Starting I/O test on /dev/mapper/mpatha (expected: pass)\n",
      ".",
      "\nReceived TERM signal, exiting successfully\n",
    ]);
  });

  it("exits with 1 on the first wrong outcome", async () => {
    await expect(loop("fail").run()).resolves.toBe(1);
    expect(output).toEqual([
      "Starting I/O test on /dev/mapper/mpatha (expected: fail)\n",
      "\nFAILURE: I/O succeeded but was expected to fail\n",
    ]);
  });
});

describe("abortOnSignals", () => {
  it("aborts on an interrupt as well as on a terminate", () => {
    for (const received of ["SIGINT", "SIGTERM"] as const) {
      const source = new EventEmitter();
      const stop = abortOnSignals(["SIGINT", "SIGTERM"], source);

      expect(stop.signal.aborted).toBe(false);
      source.emit(received);
      expect(stop.signal.aborted).toBe(true);
    }
  });

  it("stops listening once disposed", () => {
    const source = new EventEmitter();
    const stop = abortOnSignals(["SIGINT", "SIGTERM"], source);

    stop.dispose();
    source.emit("SIGINT");

    expect(stop.signal.aborted).toBe(false);
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });

  it("is fed the interrupt and terminate signals by default", () => {
    expect(createSystem().signals).toEqual(["SIGINT", "SIGTERM"]);
  });
});

describe("IoTestScript", () => {
  it("exits cleanly on any of the system's stop signals", async () => {
    const { stack, config, system } = createHarness();
    const device = tmpfile("device");
    const output = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
    const runner = new Runner(
      config,
      { ...system, signals: ["SIGUSR2"] },
      ["io-test", device, "fail"],
      new RecordingLogger(),
    );

    try {
      const finished = runner.run(IoTestScript);
      await vi.waitFor(() => expect(stack.callsTo("sg_dd")).not.toEqual([]));
      process.emit("SIGUSR2");

      await expect(finished).resolves.toBe(0);
      expect(output).toHaveBeenCalledWith(
        "\nReceived TERM signal, exiting successfully\n",
      );
      expect(process.listenerCount("SIGUSR2")).toBe(0);
    } finally {
      output.mockRestore();
    }
  });

  it("refuses a device that does not exist", async () => {
    const { config, system } = createHarness();
    const logger = new RecordingLogger();
    const runner = new Runner(
      config,
      system,
      ["io-test", "/nonexistent/pr-exerciser-device", "pass"],
      logger,
    );

    await expect(runner.run(IoTestScript)).resolves.toBe(1);
    expect(logger.lines).toContain(
      "[ERROR] Device '/nonexistent/pr-exerciser-device' does not exist",
    );
  });
});
