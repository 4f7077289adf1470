/**
 * Runtime configuration, resolved from environment variables.
 */
import type { SolverOptions } from "../engine/types";

export interface AppConfig {
  logLevel: string;
  solver: SolverOptions;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): AppConfig {
  return {
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),
    solver: {
      maxSearchNodes: Math.max(0, getEnvNumber("CROSSWORD_MAX_SEARCH_NODES", 0)),
    },
  };
}
