import type { ServerEnvironment, ServerOptions } from "./types.js";

/** `scheme://netloc/path`: all three parts non-empty. */
const INSTALLER_URL_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]+\/[^?#]*/;

/**
 * Whether an installer source is a downloadable URL rather than a file name
 * the image resolves inside /data.
 */
export function isInstallerUrl(source: string): boolean {
  return INSTALLER_URL_RE.test(source);
}

function installerEnv(prefix: "FORGE" | "FABRIC", source: string): ServerEnvironment {
  return isInstallerUrl(source) ? { [`${prefix}_INSTALLER_URL`]: source } : { [`${prefix}_INSTALLER`]: source };
}

/**
 * Build the environment for an `itzg/minecraft-server` container.
 *
 * Options that are unset (or empty, zero, false) are left out entirely so the
 * image falls back to its own defaults.
 */
export function buildEnv(options: ServerOptions): ServerEnvironment {
  const env: ServerEnvironment = {
    VERSION: options.version,
    EULA: true,
    SPAWN_PROTECTION: 0,
    ALLOW_FLIGHT: true,
    ENFORCE_WHITELIST: true,
  };

  if (options.motd) env.MOTD = options.motd;
  if (options.memory) env.MEMORY = options.memory;
  if (options.aikar) env.USE_AIKAR_FLAGS = options.aikar;

  // Forge and Fabric are exclusive; Forge wins.
  if (options.forge) {
    Object.assign(env, installerEnv("FORGE", options.forge));
  } else if (options.fabric) {
    Object.assign(env, installerEnv("FABRIC", options.fabric));
  }

  if (options.modpack) {
    env.CF_SERVER_MOD = options.modpack;
    env.TYPE = "CURSEFORGE";
    env.USE_MODPACK_START_SCRIPT = false;
  }

  if (options.players) env.MAX_PLAYERS = options.players;
  if (options.seed) env.SEED = options.seed;
  if (options.view) env.VIEW_DISTANCE = options.view;
  if (options.levelType) env.LEVEL_TYPE = options.levelType;

  return env;
}

/** Render an environment as Docker `Env` entries. */
export function toDockerEnv(env: ServerEnvironment): string[] {
  return Object.entries(env).map(([k, v]) => `${k}=${String(v)}`);
}
