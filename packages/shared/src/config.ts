import { existsSync, mkdirSync, readFileSync, openSync, writeSync, closeSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

const APP = "wristlog";

/** `WRISTLOG_CONFIG_DIR` overrides the default `~/.config/wristlog`. */
export function getConfigDir(): string {
  const dir = process.env.WRISTLOG_CONFIG_DIR || join(homedir(), ".config", APP);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

export function getModuleConfigPath(module: string): string {
  return join(getConfigDir(), `${module}.json`);
}

export function readConfig<T>(module: string): T | null {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return null;
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as T;
  } catch {
    // unreadable config counts as no config
    return null;
  }
}

export function writeConfig<T>(module: string, data: T): string {
  const filePath = getModuleConfigPath(module);
  const content = JSON.stringify(data, null, 2) + "\n";
  // Created 0600 from the start; chmod covers files that already existed.
  const fd = openSync(filePath, "w", 0o600);
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
  chmodSync(filePath, 0o600);
  return filePath;
}
