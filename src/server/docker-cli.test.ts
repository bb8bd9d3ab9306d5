import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { ProcessDockerCli } from "./docker-cli.js";

type ExecCallback = (err: Error | null, stdout: string, stderr: string) => void;

function execReturning(err: Error | null, stdout: string, stderr = "") {
  return vi.fn().mockImplementation((_cmd: string, _args: string[], cb: ExecCallback) => {
    cb(err, stdout, stderr);
  });
}

function spawnExiting(code: number | null) {
  return vi.fn().mockImplementation(() => {
    const child = new EventEmitter();
    setImmediate(() => child.emit("close", code));
    return child;
  });
}

describe("ProcessDockerCli.inspectHealth", () => {
  it("runs docker container inspect with the health template and trims the output", async () => {
    const execFn = execReturning(null, "healthy\n");
    const cli = new ProcessDockerCli({ bin: "docker", execFn: execFn as never });

    await expect(cli.inspectHealth("mc1")).resolves.toBe("healthy");
    expect(execFn).toHaveBeenCalledWith(
      "docker",
      ["container", "inspect", "-f", "{{ .State.Health.Status }}", "mc1"],
      expect.any(Function),
    );
  });

  it("rejects with stderr when the command fails", async () => {
    const execFn = execReturning(new Error("Command failed"), "", "Error: No such container: mc9\n");
    const cli = new ProcessDockerCli({ execFn: execFn as never });

    await expect(cli.inspectHealth("mc9")).rejects.toThrow("Error: No such container: mc9");
  });

  it("falls back to the error message when stderr is empty", async () => {
    const execFn = execReturning(new Error("spawn docker ENOENT"), "", "");
    const cli = new ProcessDockerCli({ execFn: execFn as never });

    await expect(cli.inspectHealth("mc1")).rejects.toThrow("spawn docker ENOENT");
  });
});

describe("ProcessDockerCli.attachConsole", () => {
  it("execs the console command interactively with inherited stdio", async () => {
    const spawnFn = spawnExiting(0);
    const cli = new ProcessDockerCli({ bin: "/usr/bin/docker", consoleCommand: "rcon-cli", spawnFn: spawnFn as never });

    await expect(cli.attachConsole("mc1")).resolves.toBe(0);
    expect(spawnFn).toHaveBeenCalledWith("/usr/bin/docker", ["exec", "-i", "mc1", "rcon-cli"], { stdio: "inherit" });
  });

  it("resolves with the session's exit code", async () => {
    const cli = new ProcessDockerCli({ spawnFn: spawnExiting(1) as never });
    await expect(cli.attachConsole("mc1")).resolves.toBe(1);
  });

  it("rejects when the process cannot be spawned", async () => {
    const spawnFn = vi.fn().mockImplementation(() => {
      const child = new EventEmitter();
      setImmediate(() => child.emit("error", new Error("spawn docker ENOENT")));
      return child;
    });
    const cli = new ProcessDockerCli({ spawnFn: spawnFn as never });

    await expect(cli.attachConsole("mc1")).rejects.toThrow("spawn docker ENOENT");
  });
});
