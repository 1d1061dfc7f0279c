import os from "node:os";
import path from "node:path";
import {z} from "zod";

import {ConfigError} from "./errors.js";

export const DEFAULT_SERVER_COMMAND = "uvx";
export const DEFAULT_SERVER_ARGS = ["awslabs.cost-explorer-mcp-server@latest"];
export const DEFAULT_REGION = "us-east-1";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase()));

const milliseconds = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        ctx.addIssue({code: z.ZodIssueCode.custom, message: `expected a non-negative integer, got "${value}"`});
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z.object({
  COST_MCP_COMMAND: z.string().trim().min(1).optional(),
  COST_MCP_ARGS: z.string().optional(),
  AWS_REGION: z.string().trim().min(1).optional(),
  COST_MCP_LOCAL_BIN: z.string().trim().min(1).optional(),
  HOME: z.string().optional(),
  COST_MCP_READ_TIMEOUT_MS: milliseconds(120_000),
  COST_MCP_STARTUP_DELAY_MS: milliseconds(0),
  COST_MCP_DEBUG: booleanFlag
});

export interface CostMcpConfig {
  command: string;
  args: string[];
  region: string;
  localBinDir: string;
  readTimeoutMs: number;
  startupDelayMs: number;
  verbose: boolean;
}

export interface ConfigOverrides {
  region?: string;
  readTimeoutMs?: number;
  verbose?: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): CostMcpConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  const home = values.HOME ?? os.homedir();

  return {
    command: values.COST_MCP_COMMAND ?? DEFAULT_SERVER_COMMAND,
    args: values.COST_MCP_ARGS ? splitArgs(values.COST_MCP_ARGS) : [...DEFAULT_SERVER_ARGS],
    region: overrides.region ?? values.AWS_REGION ?? DEFAULT_REGION,
    localBinDir: values.COST_MCP_LOCAL_BIN ?? path.join(home, ".local", "bin"),
    readTimeoutMs: overrides.readTimeoutMs ?? values.COST_MCP_READ_TIMEOUT_MS,
    startupDelayMs: values.COST_MCP_STARTUP_DELAY_MS,
    verbose: overrides.verbose ?? values.COST_MCP_DEBUG
  };
}

function splitArgs(raw: string): string[] {
  return raw
    .split(/\s+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
