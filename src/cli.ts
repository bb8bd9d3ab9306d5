import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { ServerManager } from "./server/server-manager.js";
import type { BackupOptions, OperationResult, ServerOptions } from "./server/types.js";

/** The manager operations the CLI drives. */
export type ServerOperations = Pick<
  ServerManager,
  "create" | "createBackup" | "start" | "stop" | "restart" | "delete" | "getStatus" | "openConsole"
>;

export interface CliDeps {
  loadManager?: (name: string) => Promise<ServerOperations>;
  setExitCode?: (code: number) => void;
}

export interface CreateFlags {
  mcVersion: string;
  java: string;
  port: number;
  root: string;
  motd?: string;
  memory?: string;
  aikar?: boolean;
  forge?: string;
  fabric?: string;
  modpack?: string;
  players?: number;
  seed?: string;
  view?: number;
  levelType?: string;
  backupDir?: string;
  backupInterval?: string;
  start?: boolean;
  backup?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function toServerOptions(flags: CreateFlags): ServerOptions {
  return {
    version: flags.mcVersion,
    java: flags.java,
    port: flags.port,
    root: flags.root,
    motd: flags.motd,
    memory: flags.memory,
    aikar: flags.aikar,
    forge: flags.forge,
    fabric: flags.fabric,
    modpack: flags.modpack,
    players: flags.players,
    seed: flags.seed,
    view: flags.view,
    levelType: flags.levelType,
    backupDir: flags.backupDir,
    backupInterval: flags.backupInterval,
  };
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export function buildProgram(deps: CliDeps = {}): Command {
  const loadManager = deps.loadManager ?? ((name: string) => ServerManager.load(name));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const run = async (name: string, op: (manager: ServerOperations) => Promise<OperationResult<unknown>>) => {
    const manager = await loadManager(name);
    const result = await op(manager);
    if (!result.ok) setExitCode(1);
  };

  const program = new Command()
    .name("mcsm")
    .description("Manage a Minecraft server container and its backups")
    .version(readVersion(), "-V, --cli-version");

  program
    .command("create")
    .description("Create the server container")
    .argument("<name>", "Container name")
    .requiredOption("--mc-version <version>", "Minecraft version, e.g. 1.20.1")
    .requiredOption("--java <tag>", "Java version of the server image, e.g. 17")
    .requiredOption("-p, --port <port>", "Host port for the game port", parseInteger)
    .requiredOption("-r, --root <path>", "Host directory for server data")
    .option("--motd <motd>", "Message of the day")
    .option("-m, --memory <size>", "JVM heap size, e.g. 4G")
    .option("--aikar", "Use Aikar's JVM flags")
    .option("--forge <installer>", "Forge installer URL or file name")
    .option("--fabric <installer>", "Fabric installer URL or file name (ignored with --forge)")
    .option("--modpack <pack>", "CurseForge server pack")
    .option("--players <count>", "Maximum players", parseInteger)
    .option("--seed <seed>", "World seed")
    .option("--view <distance>", "View distance in chunks", parseInteger)
    .option("--level-type <type>", "World type, e.g. FLAT")
    .option("--backup-dir <path>", "Host directory for backups")
    .option("--backup-interval <interval>", "Interval between backups, e.g. 24h")
    .option("--start", "Start the server once created")
    .option("--backup", "Also create the backup container")
    .action(async (name: string, flags: CreateFlags) => {
      await run(name, async (manager) => {
        const options = toServerOptions(flags);
        const created = await manager.create(options);
        if (!created.ok) return created;
        if (flags.start) {
          const started = await manager.start();
          if (!started.ok) return started;
        }
        if (flags.backup) return manager.createBackup(options);
        return created;
      });
    });

  program
    .command("backup")
    .description("Create the backup container")
    .argument("<name>", "Server container name")
    .requiredOption("-r, --root <path>", "Host directory for server data")
    .option("--backup-dir <path>", "Host directory for backups")
    .option("--backup-interval <interval>", "Interval between backups, e.g. 24h")
    .action(async (name: string, flags: BackupOptions) => {
      await run(name, (manager) =>
        manager.createBackup({ root: flags.root, backupDir: flags.backupDir, backupInterval: flags.backupInterval }),
      );
    });

  program
    .command("start")
    .description("Start the server")
    .argument("<name>", "Container name")
    .action(async (name: string) => {
      await run(name, (manager) => manager.start());
    });

  program
    .command("stop")
    .description("Stop the server")
    .argument("<name>", "Container name")
    .option("-f, --force", "Kill instead of stopping gracefully")
    .action(async (name: string, flags: { force?: boolean }) => {
      await run(name, (manager) => manager.stop({ force: flags.force === true }));
    });

  program
    .command("restart")
    .description("Restart the server")
    .argument("<name>", "Container name")
    .option("-f, --force", "Kill and start instead of restarting gracefully")
    .action(async (name: string, flags: { force?: boolean }) => {
      await run(name, (manager) => manager.restart({ force: flags.force === true }));
    });

  program
    .command("delete")
    .description("Kill and remove the server container")
    .argument("<name>", "Container name")
    .action(async (name: string) => {
      await run(name, (manager) => manager.delete());
    });

  program
    .command("status")
    .description("Show the server state and health")
    .argument("<name>", "Container name")
    .action(async (name: string) => {
      await run(name, (manager) => manager.getStatus());
    });

  program
    .command("console")
    .description("Attach to the server console")
    .argument("<name>", "Container name")
    .action(async (name: string) => {
      await run(name, (manager) => manager.openConsole());
    });

  return program;
}
