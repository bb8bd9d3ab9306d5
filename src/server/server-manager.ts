import { existsSync } from "node:fs";
import { resolve as resolvePath } from "node:path";
import Docker from "dockerode";
import type { z } from "zod";
import { config } from "../config/index.js";
import { createServerLog, type ServerLog } from "../config/logger.js";
import { type DockerCli, ProcessDockerCli } from "./docker-cli.js";
import { buildEnv, toDockerEnv } from "./environment.js";
import { defaultBackupDir } from "./paths.js";
import {
  type BackupOptions,
  backupOptionsSchema,
  type OperationResult,
  ServerNotFoundError,
  ServerOperationError,
  type ServerOptions,
  serverNameSchema,
  serverOptionsSchema,
  type ServerStatus,
  type StartOutcome,
} from "./types.js";

/** Game port inside the server container. */
export const SERVER_PORT = 25565;
const DATA_MOUNT = "/data";
const BACKUP_MOUNT = "/backups";

export interface ServerManagerDeps {
  docker?: Docker;
  cli?: DockerCli;
  log?: ServerLog;
  images?: { server: string; backup: string };
}

type Failure = Extract<OperationResult<never>, { ok: false }>;

interface ContainerRef {
  handle: Docker.Container;
  info: Docker.ContainerInfo;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status the engine answered with, as dockerode attaches it to its errors. */
function engineStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

// 304: the container is already in the requested state.
const NOT_MODIFIED = 304;
const NOT_FOUND = 404;

/**
 * Lifecycle facade for the Minecraft server container named `name`, plus an
 * optional `<name>-backup` companion.
 *
 * Operations never throw. Each one logs its outcome through the server's
 * logger and returns an {@link OperationResult} so callers can pick an exit
 * code or propagate.
 */
export class ServerManager {
  readonly name: string;
  private readonly docker: Docker;
  private readonly cli: DockerCli;
  private readonly log: ServerLog;
  private readonly images: { server: string; backup: string };
  private container: ContainerRef | null = null;
  private backup: ContainerRef | null = null;

  private constructor(name: string, deps: ServerManagerDeps) {
    this.name = name;
    this.docker = deps.docker ?? new Docker({ socketPath: config.docker.socketPath });
    this.cli = deps.cli ?? new ProcessDockerCli();
    this.log = deps.log ?? createServerLog(name);
    this.images = deps.images ?? config.images;
  }

  /**
   * Bind a manager to `name` and resolve any existing container with that name.
   * Throws a ZodError for a name the engine would reject.
   */
  static async load(name: string, deps: ServerManagerDeps = {}): Promise<ServerManager> {
    const manager = new ServerManager(serverNameSchema.parse(name), deps);
    manager.container = await manager.findContainer(name);
    manager.backup = await manager.findContainer(manager.backupName);
    return manager;
  }

  get backupName(): string {
    return `${this.name}-backup`;
  }

  /** Engine id of the server container, or null when none exists. */
  get containerId(): string | null {
    return this.container?.info.Id ?? null;
  }

  get backupContainerId(): string | null {
    return this.backup?.info.Id ?? null;
  }

  getDockerClient(): Docker {
    return this.docker;
  }

  /**
   * Pull `<serverImage>:java<java>` and create (but do not start) the server
   * container with its port binding, /data mount and environment.
   */
  async create(input: ServerOptions): Promise<OperationResult<string>> {
    const parsed = this.validate(serverOptionsSchema, input);
    if (!parsed.ok) {
      this.log.err("Failed to Create Server", { error: parsed.error.message });
      return parsed;
    }
    const options = parsed.value;

    try {
      if (existsSync(options.root)) {
        this.log.warn(`Server root '${options.root}' exists - there may be problems!`);
      }

      const image = `${this.images.server}:java${options.java}`;
      await this.pullImage(image);

      const portKey = `${SERVER_PORT}/tcp`;
      await this.docker.createContainer({
        Image: image,
        name: this.name,
        Env: toDockerEnv(buildEnv(options)),
        ExposedPorts: { [portKey]: {} },
        HostConfig: {
          PortBindings: { [portKey]: [{ HostPort: String(options.port) }] },
          Binds: [`${resolvePath(options.root)}:${DATA_MOUNT}:rw`],
        },
      });

      this.container = await this.findContainer(this.name);
      const id = this.containerId;
      if (!id) throw new Error(`Container ${this.name} not visible after creation`);
      this.log.success("Successfully Created Server");
      return { ok: true, value: id };
    } catch (err) {
      this.log.err("Failed to Create Server", { error: errorMessage(err) });
      return this.fail("runtime", `Failed to create server: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Pull the backup image, then create and start `<name>-backup` with the
   * server root mounted read-only and the backup directory read-write.
   */
  async createBackup(input: BackupOptions): Promise<OperationResult<string>> {
    const parsed = this.validate(backupOptionsSchema, input);
    if (!parsed.ok) {
      this.log.err("Failed to Create Backup", { error: parsed.error.message });
      return parsed;
    }
    const options = parsed.value;
    const backupDir = resolvePath(options.backupDir ?? defaultBackupDir(options.root));

    try {
      await this.pullImage(this.images.backup);

      const created = await this.docker.createContainer({
        Image: this.images.backup,
        name: this.backupName,
        Env: toDockerEnv({ BACKUP_INTERVAL: options.backupInterval ?? config.backup.interval }),
        HostConfig: {
          Binds: [`${resolvePath(options.root)}:${DATA_MOUNT}:ro`, `${backupDir}:${BACKUP_MOUNT}:rw`],
        },
      });
      await created.start();

      this.backup = await this.findContainer(this.backupName);
      this.log.success(`Successfully Created Backup Container (${backupDir})`);
      return { ok: true, value: created.id };
    } catch (err) {
      this.log.err("Failed to Create Backup", { error: errorMessage(err) });
      return this.fail("runtime", `Failed to create backup container: ${errorMessage(err)}`, err);
    }
  }

  /** Start the server unless the engine already reports it running. */
  async start(): Promise<OperationResult<StartOutcome>> {
    try {
      this.container = await this.findContainer(this.name);
      const ref = this.container;
      if (!ref) {
        this.log.err("Failed to Start Server");
        return this.notFound();
      }
      if (ref.info.State === "running") {
        this.log.warn("Server Already Running");
        return { ok: true, value: "already-running" };
      }

      try {
        await ref.handle.start();
      } catch (err) {
        if (engineStatus(err) !== NOT_MODIFIED) throw err;
        this.log.warn("Server Already Running");
        return { ok: true, value: "already-running" };
      }
      this.container = await this.findContainer(this.name);
      this.log.success("Successfully Started Server");
      return { ok: true, value: "started" };
    } catch (err) {
      this.log.err("Failed to Start Server");
      return this.fail("runtime", `Failed to start server: ${errorMessage(err)}`, err);
    }
  }

  /** Graceful stop, or SIGKILL when `force` is set. */
  async stop({ force = false }: { force?: boolean } = {}): Promise<OperationResult> {
    const ref = this.container;
    if (!ref) {
      this.log.err("Failed to Stop Server");
      return this.notFound();
    }

    try {
      if (force) {
        await ref.handle.kill();
      } else {
        await ref.handle.stop().catch((err: unknown) => {
          if (engineStatus(err) !== NOT_MODIFIED) throw err;
        });
      }
      this.container = await this.findContainer(this.name);
      this.log.success("Successfully Stopped Server");
      return { ok: true, value: undefined };
    } catch (err) {
      this.log.err("Failed to Stop Server");
      return this.fail("runtime", `Failed to stop server: ${errorMessage(err)}`, err);
    }
  }

  /** Graceful restart, or kill followed by start when `force` is set. */
  async restart({ force = false }: { force?: boolean } = {}): Promise<OperationResult> {
    const ref = this.container;
    if (!ref) {
      this.log.err("Failed to Restart Server");
      return this.notFound();
    }

    try {
      if (force) {
        await ref.handle.kill();
        await ref.handle.start();
      } else {
        await ref.handle.restart();
      }
      this.container = await this.findContainer(this.name);
      this.log.success("Successfully Restarted Server");
      return { ok: true, value: undefined };
    } catch (err) {
      this.log.err("Failed to Restart Server");
      return this.fail("runtime", `Failed to restart server: ${errorMessage(err)}`, err);
    }
  }

  /** Kill and remove the server container. The backup container is left alone. */
  async delete(): Promise<OperationResult> {
    const ref = this.container;
    if (!ref) {
      this.log.err("Failed to Delete Server");
      return this.notFound();
    }

    // A container that is not running cannot be killed; removal still proceeds.
    await this.stop({ force: true });

    try {
      await ref.handle.remove();
      this.container = null;
      this.log.success("Successfully Deleted Server");
      return { ok: true, value: undefined };
    } catch (err) {
      this.log.err("Failed to Delete Server");
      if (engineStatus(err) === NOT_FOUND) {
        this.container = null;
        return this.notFound();
      }
      return this.fail("runtime", `Failed to delete server: ${errorMessage(err)}`, err);
    }
  }

  /** Combine the engine's coarse state with the healthcheck status. */
  async getStatus(): Promise<OperationResult<ServerStatus>> {
    try {
      this.container = await this.findContainer(this.name);
      const ref = this.container;
      if (!ref) {
        this.log.err("Failed to Get Server Status");
        return this.notFound();
      }

      const health = await this.cli.inspectHealth(this.name);
      const state = ref.info.State;

      if (state.toLowerCase() === "running") {
        if (health.toLowerCase() === "healthy") {
          this.log.success("Server is running and healthy");
        } else if (health.toLowerCase() === "starting") {
          this.log.notice("Server is starting");
        } else {
          this.log.warn(`Server is running but in degraded state: ${health}`);
        }
      } else {
        this.log.info(`Server is ${state}`);
      }

      return { ok: true, value: { name: this.name, state, health } };
    } catch (err) {
      this.log.err("Failed to Get Server Status", { error: errorMessage(err) });
      return this.fail("runtime", `Failed to get server status: ${errorMessage(err)}`, err);
    }
  }

  /** Attach the terminal to the server console. Resolves when the session ends. */
  async openConsole(): Promise<OperationResult> {
    if (!this.container) {
      this.log.err("Failed to Open Console");
      return this.notFound();
    }

    try {
      const code = await this.cli.attachConsole(this.name);
      if (code !== 0) {
        throw new Error(`Console exited with code ${code}`);
      }
      return { ok: true, value: undefined };
    } catch (err) {
      this.log.err("Failed to Open Console", { error: errorMessage(err) });
      return this.fail("runtime", `Failed to open console: ${errorMessage(err)}`, err);
    }
  }

  // --- Private helpers ---

  private validate<T>(schema: z.ZodType<T>, input: T): OperationResult<T> {
    const result = schema.safeParse(input);
    if (result.success) return { ok: true, value: result.data };
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
    return this.fail("validation", `Invalid server options: ${detail}`);
  }

  private fail(kind: "validation" | "runtime", message: string, cause?: unknown): Failure {
    return { ok: false, error: new ServerOperationError(kind, this.name, message, { cause }) };
  }

  private notFound(): Failure {
    return { ok: false, error: new ServerNotFoundError(this.name) };
  }

  private async pullImage(image: string): Promise<void> {
    this.log.info(`Pulling image ${image}`);
    const stream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Look a container up by exact name. The engine's name filter matches
   * substrings, so `/<name>` is checked against the returned names.
   */
  private async findContainer(name: string): Promise<ContainerRef | null> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { name: [name] },
    });

    const info = containers.find((c) => c.Names.includes(`/${name}`));
    if (!info) return null;
    return { handle: this.docker.getContainer(info.Id), info };
  }
}
