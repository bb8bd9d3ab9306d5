import { z } from "zod";

/** Container names accepted by the Docker Engine. */
const containerNameRegex = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

export const serverNameSchema = z
  .string()
  .regex(containerNameRegex, "Name must start with an alphanumeric char and contain only [a-zA-Z0-9_.-]");

/** Options for a Minecraft server container and its backup companion. */
export const serverOptionsSchema = z.object({
  /** Minecraft version, e.g. "1.20.1" or "LATEST". */
  version: z.string().min(1, "Version is required"),
  motd: z.string().optional(),
  /** JVM heap size, e.g. "4G". */
  memory: z.string().optional(),
  /** Enable Aikar's GC flags. */
  aikar: z.boolean().optional(),
  /** Forge installer: a URL or a file name inside the data directory. Wins over fabric. */
  forge: z.string().optional(),
  /** Fabric installer: a URL or a file name inside the data directory. */
  fabric: z.string().optional(),
  /** CurseForge server pack. */
  modpack: z.string().optional(),
  players: z.number().int().positive().optional(),
  seed: z.string().optional(),
  view: z.number().int().positive().optional(),
  levelType: z.string().optional(),
  /** Host port bound to the server's game port. */
  port: z.number().int().min(1).max(65535),
  /** Host directory mounted as the server's /data. */
  root: z.string().min(1, "Server root is required"),
  backupDir: z.string().min(1).optional(),
  /** Interval between backups, e.g. "24h" or "90m". */
  backupInterval: z.string().min(1).optional(),
  /** Java version tag of the server image, e.g. "17". */
  java: z.string().min(1, "Java version is required"),
});

export type ServerOptions = z.infer<typeof serverOptionsSchema>;

/** The subset of server options the backup container needs. */
export const backupOptionsSchema = serverOptionsSchema.pick({ root: true, backupDir: true, backupInterval: true });

export type BackupOptions = z.infer<typeof backupOptionsSchema>;

/** Environment injected into the server container. */
export type ServerEnvironment = Record<string, string | number | boolean>;

export type ServerErrorKind = "validation" | "runtime" | "not-found";

export class ServerOperationError extends Error {
  readonly kind: ServerErrorKind;
  readonly server: string;

  constructor(kind: ServerErrorKind, server: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ServerOperationError";
    this.kind = kind;
    this.server = server;
  }
}

export class ServerNotFoundError extends ServerOperationError {
  constructor(server: string) {
    super("not-found", server, `Server not found: ${server}`);
    this.name = "ServerNotFoundError";
  }
}

export type OperationResult<T = void> = { ok: true; value: T } | { ok: false; error: ServerOperationError };

/** Outcome of `start()`. */
export type StartOutcome = "started" | "already-running";

/** Live status of the server container. */
export interface ServerStatus {
  name: string;
  /** Coarse container state reported by the engine: running, exited, created, ... */
  state: string;
  /** Healthcheck status: healthy, starting, unhealthy, or whatever the inspect template printed. */
  health: string;
}
