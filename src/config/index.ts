import { z } from "zod";

export const LOG_LEVELS = ["error", "warn", "notice", "success", "info", "debug"] as const;

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(LOG_LEVELS).default("info"),

  /** Docker Engine connection and the CLI used for out-of-process queries. */
  docker: z
    .object({
      socketPath: z.string().min(1).default("/var/run/docker.sock"),
      cliPath: z.string().min(1).default("docker"),
    })
    .default({
      socketPath: "/var/run/docker.sock",
      cliPath: "docker",
    }),

  /** Container images. The server image is tagged `java<version>` per server. */
  images: z
    .object({
      server: z.string().min(1).default("itzg/minecraft-server"),
      backup: z.string().min(1).default("itzg/mc-backup"),
    })
    .default({
      server: "itzg/minecraft-server",
      backup: "itzg/mc-backup",
    }),

  backup: z
    .object({
      interval: z.string().min(1).default("24h"),
    })
    .default({
      interval: "24h",
    }),

  console: z
    .object({
      command: z.string().min(1).default("rcon-cli"),
    })
    .default({
      command: "rcon-cli",
    }),
});

export const config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  docker: {
    socketPath: process.env.DOCKER_SOCKET,
    cliPath: process.env.DOCKER_CLI,
  },
  images: {
    server: process.env.SERVER_IMAGE,
    backup: process.env.BACKUP_IMAGE,
  },
  backup: {
    interval: process.env.BACKUP_INTERVAL,
  },
  console: {
    command: process.env.CONSOLE_COMMAND,
  },
});

export type Config = z.infer<typeof configSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];
