import { describe, it, expect, vi } from "vitest";
import { PROCESS_RUNNING } from "@hookloop/shared";
import { Scheduler } from "../scheduler.js";
import { createProcessDecoder, runProcess } from "../process.js";
import { FakeHost } from "../testing.js";

describe("runProcess", () => {
  it("hands command, options and timeout to the host", () => {
    const host = new FakeHost();
    const scheduler = new Scheduler(host);

    void runProcess(scheduler, "ls -l", { cwd: "/tmp" }, 5000);

    expect(host.processes).toHaveLength(1);
    expect(host.processes[0]).toMatchObject({
      command: "ls -l",
      options: { cwd: "/tmp" },
      timeoutMs: 5000,
    });
    expect(host.processes[0].callbackId).toMatch(/^process_/);
  });

  it("resolves with the completed output", async () => {
    const host = new FakeHost();
    const scheduler = new Scheduler(host);
    const output = runProcess(scheduler, "echo hi", {}, 0);

    host.completeProcess(0, { returnCode: 0, stdout: "hi\n" });

    await expect(output).resolves.toEqual({
      command: "echo hi",
      returnCode: 0,
      stdout: "hi\n",
      stderr: "",
    });
  });

  it("concatenates streamed chunks", async () => {
    const host = new FakeHost();
    const scheduler = new Scheduler(host);
    const output = runProcess(scheduler, "cat big", {}, 0);

    host.completeProcess(0, { returnCode: PROCESS_RUNNING, stdout: "one " });
    host.completeProcess(0, { returnCode: PROCESS_RUNNING, stdout: "two ", stderr: "warn" });
    expect(scheduler.pendingCount).toBe(1);
    host.completeProcess(0, { returnCode: 1, stdout: "three" });

    await expect(output).resolves.toEqual({
      command: "cat big",
      returnCode: 1,
      stdout: "one two three",
      stderr: "warn",
    });
  });

  it("releases the registration when the host refuses the command", async () => {
    const host = new FakeHost();
    const scheduler = new Scheduler(host);
    vi.spyOn(host, "hookProcess").mockImplementation(() => {
      throw new Error("process hook unavailable");
    });

    await expect(runProcess(scheduler, "true", {}, 0)).rejects.toThrow("process hook unavailable");
    expect(scheduler.pendingCount).toBe(0);
  });

  it("fails on a malformed delivery", async () => {
    const host = new FakeHost();
    const scheduler = new Scheduler(host);
    const output = runProcess(scheduler, "true", {}, 0);

    host.processes[0].callback(host.processes[0].callbackId, { returnCode: "zero" });

    await expect(output).rejects.toThrow(TypeError);
    await expect(output).rejects.toThrow(/^Malformed process delivery/);
  });
});

describe("createProcessDecoder", () => {
  it("keeps state per decoder", () => {
    const first = createProcessDecoder();
    const second = createProcessDecoder();
    const chunk = { command: "c", returnCode: PROCESS_RUNNING, stdout: "a", stderr: "" };

    expect(first(chunk)).toEqual({ type: "partial" });
    expect(second({ ...chunk, returnCode: 0 })).toEqual({
      type: "value",
      value: { command: "c", returnCode: 0, stdout: "a", stderr: "" },
    });
  });
});
