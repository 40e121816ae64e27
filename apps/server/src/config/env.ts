import path from "node:path";
import { fileURLToPath } from "node:url";
import { TICK_SECONDS, toFiniteNumber } from "@tickbound/shared";

export interface ServerEnv {
  port: number;
  tickSeconds: number;
  saveDir: string;
  poisonConfigPath: string;
  isProduction: boolean;
}

const DEFAULT_PORT = 2567;
const DEFAULT_POISON_CONFIG_PATH = fileURLToPath(new URL("../../assets/poison-configs.json", import.meta.url));

const readString = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

/**
 * Server settings from environment variables. Invalid numbers fall back to defaults.
 */
export const readServerEnv = (env: NodeJS.ProcessEnv = process.env): ServerEnv => {
  const port = Math.trunc(toFiniteNumber(env.PORT, DEFAULT_PORT));
  const tickSeconds = toFiniteNumber(env.TICK_SECONDS, TICK_SECONDS);
  return {
    port: port > 0 ? port : DEFAULT_PORT,
    tickSeconds: tickSeconds > 0 ? tickSeconds : TICK_SECONDS,
    saveDir: path.resolve(readString(env.SAVE_DIR, "./saves")),
    poisonConfigPath: path.resolve(readString(env.POISON_CONFIG_PATH, DEFAULT_POISON_CONFIG_PATH)),
    isProduction: env.NODE_ENV === "production",
  };
};
