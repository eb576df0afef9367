import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError, readConfig, writeConfig } from "@wristlog/shared";
import type { Credentials } from "./types.ts";

export const TOOL = "amazfit";

export type CredentialSource = "flag" | "env" | "config";

export interface CredentialFlags {
  token?: string;
  userId?: string;
}

const savedCredentials = z.object({
  token: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
});

/** Load `.env` from the working directory; variables already set win. */
export function loadEnv(path?: string): void {
  loadDotenv({ path });
}

function saved(): z.output<typeof savedCredentials> {
  const raw = readConfig<unknown>(TOOL);
  if (raw === null) return {};
  const result = savedCredentials.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Saved ${TOOL} config is invalid. Run: ${TOOL} auth-setup <token> <userId>`);
  }
  return result.data;
}

function pick(
  flag: string | undefined,
  env: string | undefined,
  config: string | undefined,
): { value: string; source: CredentialSource } | null {
  if (flag) return { value: flag, source: "flag" };
  if (env) return { value: env, source: "env" };
  if (config) return { value: config, source: "config" };
  return null;
}

/** Where each credential would come from: flags, then environment, then saved config. */
export function credentialSources(
  flags: CredentialFlags,
  env: NodeJS.ProcessEnv = process.env,
): { token: CredentialSource | null; userId: CredentialSource | null } {
  const config = saved();
  return {
    token: pick(flags.token, env.AMAZFIT_TOKEN, config.token)?.source ?? null,
    userId: pick(flags.userId, env.AMAZFIT_USER_ID, config.userId)?.source ?? null,
  };
}

export function resolveCredentials(
  flags: CredentialFlags,
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const config = saved();
  const token = pick(flags.token, env.AMAZFIT_TOKEN, config.token);
  const userId = pick(flags.userId, env.AMAZFIT_USER_ID, config.userId);
  if (token && userId) return { token: token.value, userId: userId.value };

  const missing = [
    ...(token ? [] : ["AMAZFIT_TOKEN/--token"]),
    ...(userId ? [] : ["AMAZFIT_USER_ID/--user-id"]),
  ];
  throw new ConfigurationError(
    `Missing required value(s): ${missing.join(", ")}. Set env vars, pass flags or run '${TOOL} auth-setup'.`,
  );
}

export function saveCredentials(credentials: Credentials): string {
  return writeConfig(TOOL, credentials);
}
