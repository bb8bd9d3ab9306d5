import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  const { config } = await import("./index.js");
  return config;
}

const CONFIG_VARS = [
  "LOG_LEVEL",
  "DOCKER_SOCKET",
  "DOCKER_CLI",
  "SERVER_IMAGE",
  "BACKUP_IMAGE",
  "BACKUP_INTERVAL",
  "CONSOLE_COMMAND",
];

describe("config", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of CONFIG_VARS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const key of CONFIG_VARS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it("applies defaults when nothing is set", async () => {
    const config = await loadConfig();

    expect(config.logLevel).toBe("info");
    expect(config.docker).toEqual({ socketPath: "/var/run/docker.sock", cliPath: "docker" });
    expect(config.images).toEqual({ server: "itzg/minecraft-server", backup: "itzg/mc-backup" });
    expect(config.backup.interval).toBe("24h");
    expect(config.console.command).toBe("rcon-cli");
  });

  it("reads overrides from the environment", async () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    vi.stubEnv("DOCKER_SOCKET", "/run/user/1000/docker.sock");
    vi.stubEnv("SERVER_IMAGE", "registry.example.test/minecraft-server");
    vi.stubEnv("BACKUP_INTERVAL", "6h");
    const config = await loadConfig();

    expect(config.logLevel).toBe("debug");
    expect(config.docker.socketPath).toBe("/run/user/1000/docker.sock");
    expect(config.images.server).toBe("registry.example.test/minecraft-server");
    expect(config.backup.interval).toBe("6h");
  });

  it("accepts the custom log levels", async () => {
    vi.stubEnv("LOG_LEVEL", "success");
    const config = await loadConfig();
    expect(config.logLevel).toBe("success");
  });

  it("rejects an unknown log level", async () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    await expect(loadConfig()).rejects.toThrow();
  });
});
