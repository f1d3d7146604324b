import { DEFAULT_MAX_DEPTH } from "./classify.js";

export interface ConverterConfig {
  /** Fail on values that only have a placeholder in TOML. */
  strict: boolean;
  maxDepth: number;
}

export function loadConfig(): ConverterConfig {
  return {
    strict: process.env.TOML_MCP_STRICT === "true", // default false
    maxDepth: parseLimit(process.env.TOML_MCP_MAX_DEPTH, DEFAULT_MAX_DEPTH),
  };
}

function parseLimit(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

export function formatConfigString(config: ConverterConfig): string {
  return `strict=${config.strict}, max_depth=${config.maxDepth}`;
}
