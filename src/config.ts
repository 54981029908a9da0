import { promises as fs } from 'fs';
import { z } from 'zod';
import type { VideoConfig } from './types.js';
import { ConfigFormatError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'Makefile.config.json';

// ── Schema ────────────────────────────────────────────────────────────────────

const StringListSchema = z.union([z.string(), z.array(z.string())]);

// Filter units are only checked for being objects here; formatFunction
// reports key-count and argument-type problems with the function name.
const FilterStageSchema = z.object({
  istream: z.string(),
  func: z.record(z.string(), z.unknown()),
  ostream: z.string(),
});

const InputOptionsSchema = z
  .object({ i: z.string().min(1) })
  .catchall(z.union([z.string(), z.number()]));

const ClipSchema = z.object({
  input: z.union([z.string().min(1), z.array(z.union([z.string().min(1), InputOptionsSchema]))]),
  output: z.string().min(1),
  filter_complex: z.union([z.string(), z.array(z.union([z.string(), FilterStageSchema]))]).optional(),
  codec: z
    .object({
      audio: z.string().min(1).optional(),
      video: z.string().min(1).optional(),
    })
    .optional(),
  attributes: z.array(z.string()).optional(),
  require: StringListSchema.optional(),
  movflags: StringListSchema.optional(),
});

const VideoConfigSchema = z.object({
  videos: z.array(ClipSchema),
});

// ── Loading ───────────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed JSON document
 */
export function parseConfig(raw: unknown, source: string = DEFAULT_CONFIG_FILE): VideoConfig {
  const parsed = VideoConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigFormatError(source, issues);
  }
  return parsed.data;
}

/**
 * Read and validate a configuration file.
 * I/O and JSON syntax errors are passed through unchanged.
 */
export async function loadConfig(configPath: string): Promise<VideoConfig> {
  const content = await fs.readFile(configPath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parseConfig(raw, configPath);
}
