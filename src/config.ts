import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "@sch/errors";
import { DEFAULT_GRID } from "@sch/kicad/Geometry";

const positive = z.number().positive();

const configSchema = z
  .object({
    grid: positive.default(DEFAULT_GRID),
    routing: z
      .object({
        cellSize: positive.optional(),
        clearance: z.number().nonnegative().default(0),
        margin: z.number().int().nonnegative().default(10),
      })
      .strict()
      .default({}),
    project: z.string().default(""),
    libraryPaths: z.array(z.string()).default([]),
  })
  .strict();

export type EngineConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  /** Return the defaults instead of failing when the file does not exist. */
  optional?: boolean;
}

export function defaultConfig(): EngineConfig {
  return configSchema.parse({});
}

/**
 * Reads `schematic.yml`. Library paths are resolved against the file's folder.
 */
export function loadConfig(filePath: string, options: LoadConfigOptions = {}): EngineConfig {
  if (!fs.existsSync(filePath)) {
    if (options.optional) return defaultConfig();
    throw new ConfigError(`Config file not found: ${filePath}`, [], { filePath });
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Failed to parse ${filePath}`, [e instanceof Error ? e.message : String(e)], { filePath });
  }

  const config = parseConfig(raw ?? {}, filePath);
  const baseDir = path.dirname(filePath);
  return { ...config, libraryPaths: config.libraryPaths.map((p) => path.resolve(baseDir, p)) };
}

/** Validates an already-decoded config object. */
export function parseConfig(raw: unknown, source = "<inline>"): EngineConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}`, issues, { source });
  }
  return result.data;
}
