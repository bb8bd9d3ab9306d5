import { execFile as defaultExecFile, spawn as defaultSpawn } from "node:child_process";
import { config } from "../config/index.js";

/** Docker operations that run through the `docker` binary rather than the Engine API. */
export interface DockerCli {
  /** Healthcheck status of a container, as printed by `docker container inspect`. */
  inspectHealth(name: string): Promise<string>;
  /** Attach this process's stdio to the console client inside a container. Resolves with the exit code. */
  attachConsole(name: string): Promise<number | null>;
}

export interface ProcessDockerCliOptions {
  bin?: string;
  consoleCommand?: string;
  execFn?: typeof defaultExecFile;
  spawnFn?: typeof defaultSpawn;
}

const HEALTH_TEMPLATE = "{{ .State.Health.Status }}";

/**
 * Runs the docker CLI with explicit argument arrays (execFile/spawn, never a
 * shell), so the server name cannot inject commands.
 */
export class ProcessDockerCli implements DockerCli {
  private readonly bin: string;
  private readonly consoleCommand: string;
  private readonly execFn: typeof defaultExecFile;
  private readonly spawnFn: typeof defaultSpawn;

  constructor(options: ProcessDockerCliOptions = {}) {
    this.bin = options.bin ?? config.docker.cliPath;
    this.consoleCommand = options.consoleCommand ?? config.console.command;
    this.execFn = options.execFn ?? defaultExecFile;
    this.spawnFn = options.spawnFn ?? defaultSpawn;
  }

  async inspectHealth(name: string): Promise<string> {
    const stdout = await new Promise<string>((resolve, reject) => {
      this.execFn(this.bin, ["container", "inspect", "-f", HEALTH_TEMPLATE, name], (err, out, stderr) => {
        if (err) {
          reject(new Error(String(stderr).trim() || err.message));
        } else {
          resolve(String(out));
        }
      });
    });
    return stdout.replace(/\n/g, "").trim();
  }

  async attachConsole(name: string): Promise<number | null> {
    const child = this.spawnFn(this.bin, ["exec", "-i", name, this.consoleCommand], { stdio: "inherit" });
    return new Promise<number | null>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code) => resolve(code));
    });
  }
}
