export { type Config, config } from "./config/index.js";
export { createServerLog, logger, type ServerLog } from "./config/logger.js";
export { type DockerCli, ProcessDockerCli, type ProcessDockerCliOptions } from "./server/docker-cli.js";
export { buildEnv, isInstallerUrl, toDockerEnv } from "./server/environment.js";
export { defaultBackupDir, parentDir } from "./server/paths.js";
export { SERVER_PORT, ServerManager, type ServerManagerDeps } from "./server/server-manager.js";
export {
  type BackupOptions,
  backupOptionsSchema,
  type OperationResult,
  type ServerEnvironment,
  type ServerErrorKind,
  ServerNotFoundError,
  ServerOperationError,
  type ServerOptions,
  serverOptionsSchema,
  type ServerStatus,
  type StartOutcome,
} from "./server/types.js";
