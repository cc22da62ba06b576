import { describe, it, expect, vi, afterEach } from "vitest";
import { PROCESS_ERROR, type ReadinessSource } from "@hookloop/shared";
import { Scheduler, runProcess, sleep } from "@hookloop/kernel";
import { NodeHost, createNodeHost, runShellCommand } from "../node-host.js";
import type { FetchFn } from "../url-request.js";

describe("runShellCommand", () => {
  it("captures stdout", async () => {
    expect(await runShellCommand("/bin/sh", "printf hello", 0)).toEqual({
      command: "printf hello",
      returnCode: 0,
      stdout: "hello",
      stderr: "",
    });
  });

  it("captures stderr and the exit code", async () => {
    const output = await runShellCommand("/bin/sh", "echo oops >&2; exit 3", 0);

    expect(output.returnCode).toBe(3);
    expect(output.stderr).toBe("oops\n");
  });

  it("kills commands that outlive the timeout", async () => {
    const output = await runShellCommand("/bin/sh", "exec sleep 5", 100);

    expect(output.returnCode).toBe(PROCESS_ERROR);
    expect(output.stderr).toBe("Command timed out after 100 ms");
  });

  it("reports a missing shell", async () => {
    const output = await runShellCommand("/nonexistent/sh", "true", 0);

    expect(output.returnCode).toBe(PROCESS_ERROR);
  });
});

describe("NodeHost", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("delivers the timer marker after the delay", () => {
    vi.useFakeTimers();
    const host = new NodeHost();
    const callback = vi.fn();

    host.hookTimer(100, callback, "timer_1");
    vi.advanceTimersByTime(99);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledWith("timer_1", 0);
  });

  it("routes url: commands to fetch", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("pong"));
    const host = createNodeHost({ fetch: fetchFn });
    const callback = vi.fn();

    host.hookProcess("url:https://api.test/ping", {}, 0, callback, "process_1");

    await vi.waitFor(() => expect(callback).toHaveBeenCalledTimes(1));
    expect(callback).toHaveBeenCalledWith("process_1", {
      command: "url:https://api.test/ping",
      returnCode: 0,
      stdout: "pong",
      stderr: "",
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("routes other commands to the shell", async () => {
    const fetchFn = vi.fn<FetchFn>();
    const host = new NodeHost({ fetch: fetchFn });
    const callback = vi.fn();

    host.hookProcess("printf shell", {}, 0, callback, "process_2");

    await vi.waitFor(() => expect(callback).toHaveBeenCalledTimes(1));
    expect(callback.mock.calls[0][1]).toMatchObject({ returnCode: 0, stdout: "shell" });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("forwards readiness notifications until unhooked", () => {
    const listeners = new Set<() => void>();
    const source: ReadinessSource = {
      onReadable(listener) {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
    };
    const host = new NodeHost();
    const callback = vi.fn();

    const unhook = host.hookReadable(source, callback, "socket_1");
    for (const listener of listeners) listener();
    expect(callback).toHaveBeenCalledWith("socket_1", undefined);

    unhook();
    expect(listeners.size).toBe(0);
  });

  it("drives the scheduler end to end", async () => {
    const scheduler = new Scheduler(new NodeHost());

    await expect(sleep(scheduler, 5)).resolves.toBe(0);
    const output = await runProcess(scheduler, "printf done", {}, 5000);
    expect(output.stdout).toBe("done");
    expect(scheduler.pendingCount).toBe(0);
  });
});
