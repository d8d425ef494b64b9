import { readFile } from "node:fs/promises";
import { z } from "zod";

export const SessionConfigSchema = z
  .object({
    seed: z.union([z.number().int(), z.string().min(1)]).default(0),
    randomizeParams: z.boolean().default(true),
    sampleRate: z.number().int().min(8000).max(192000).default(48000),
    blockSize: z.number().int().min(16).max(8192).default(512),
    quiet: z.boolean().default(false)
  })
  .strict();

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export type ConfigOverrides = Partial<SessionConfig>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function parseConfig(input: unknown, source = "config"): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Reads an optional JSON config file, then layers command-line overrides on
 * top. Without a file every field takes its default.
 */
export async function loadConfig(
  path?: string,
  overrides: ConfigOverrides = {}
): Promise<SessionConfig> {
  let fileConfig: unknown = {};
  if (path !== undefined) {
    const raw = await readFile(path, "utf8");
    try {
      fileConfig = JSON.parse(raw);
    } catch {
      throw new ConfigError(path, ["file is not valid JSON"]);
    }
  }

  const base = parseConfig(fileConfig, path ?? "defaults");
  return parseConfig({ ...base, ...definedOnly(overrides) }, "command line");
}

function definedOnly(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
}
