import { describe, it, expect } from "vitest";
import { ToolInvocationError } from "../../src/core/errors.js";
import { RemoteCommandRunner } from "../../src/tools/exec.js";
import { MultipathDaemon, pathWwid } from "../../src/tools/multipathd.js";
import { FakeStorageStack } from "../fakes/storage-stack.js";

describe("MultipathDaemon", () => {
  it("reports the map's PR view", async () => {
    const stack = new FakeStorageStack();
    stack.lu.register("local", null, 0x2n);
    stack.lu.reserve("local", 0x2n, 5);

    const view = await new MultipathDaemon(stack).readPrView("mpatha");

    expect(view).toEqual({ prKey: 0x2n, prStatus: "set", prHold: "set" });
    expect(stack.calls).toEqual([
      "multipathd getprkey map mpatha",
      "multipathd getprstatus map mpatha",
      "multipathd getprhold map mpatha",
    ]);
  });

  it("reports an unregistered map", async () => {
    const view = await new MultipathDaemon(new FakeStorageStack()).readPrView(
      "mpatha",
    );
    expect(view).toEqual({ prKey: null, prStatus: "unset", prHold: "unset" });
  });

  it("does not treat exit code 6 from the daemon as a Unit Attention", async () => {
    const stack = new FakeStorageStack();
    stack.injectUnitAttention("multipathd");

    const failure = new MultipathDaemon(stack).getPrKey("mpatha");

    await expect(failure).rejects.toBeInstanceOf(ToolInvocationError);
    await expect(failure).rejects.toMatchObject({
      kind: "tool-invocation",
      failure: {
        command: "multipathd getprkey map mpatha",
        exitCode: 6,
        stderr: "Unit attention",
      },
    });
    expect(stack.calls).toHaveLength(1);
  });

  it("looks up a map's WWID", async () => {
    const stack = new FakeStorageStack();
    const daemon = new MultipathDaemon(stack);
    expect(await daemon.mapWwid("mpatha")).toBe(stack.lu.wwid);
    expect(await daemon.mapWwid("mpathz")).toBeNull();
  });
});

describe("pathWwid", () => {
  it("asks udev for the device serial", async () => {
    const stack = new FakeStorageStack();
    expect(await pathWwid(stack, "sdb")).toBe(stack.lu.wwid);
    expect(stack.calls).toEqual([
      "udevadm info -n /dev/sdb --query=property --property=ID_SERIAL --value",
    ]);
  });

  it("fails outright when udevadm exits with 6", async () => {
    const stack = new FakeStorageStack();
    stack.injectUnitAttention("udevadm");

    await expect(pathWwid(stack, "sdb")).rejects.toBeInstanceOf(
      ToolInvocationError,
    );
    expect(stack.callsTo("udevadm")).toHaveLength(1);
  });

  it("asks over ssh when the device is remote", async () => {
    const stack = new FakeStorageStack({ host: "storage-b" });
    const remote = new RemoteCommandRunner("storage-b", stack);
    expect(await pathWwid(remote, "sdb")).toBe(stack.lu.wwid);
    expect(await pathWwid(stack, "sdb")).toBeNull();
  });
});
