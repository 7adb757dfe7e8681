import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "ECHOCAST_STATE_DIR";
export const CONFIG_PATH_ENV = "ECHOCAST_CONFIG_PATH";

function expandHome(raw: string, homedir: () => string): string {
  if (raw === "~") {
    return homedir();
  }
  if (raw.startsWith("~/")) {
    return path.join(homedir(), raw.slice(2));
  }
  return raw;
}

export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(homedir(), ".echocast");
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override, homedir));
  }
  return path.join(resolveStateDir(env, homedir), "echocast.json");
}
