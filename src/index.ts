import { promises as fs } from 'fs';
import path from 'path';
import { loadConfig } from './config.js';
import { renderMakefile } from './makefile.js';
import { getOverlayConfig } from './overlay.js';
import { FINAL_OUTPUT } from './final.js';
import { hasAttribute } from './command.js';

export const MAKEFILE_PATH = 'Makefile';
export const BUILD_DIR = 'build';

export interface RunOptions {
  configFile: string;
  /** Directory the config path is resolved against and Makefile/build land in */
  cwd?: string;
  env?: Record<string, unknown>;
  now?: Date;
}

export interface RunResult {
  makefilePath: string;
  buildDir: string;
  clipCount: number;
  buildableCount: number;
  postDate: string;
}

async function ensureOutputDir(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Load the config, render the Makefile and write it, then create build/
 */
export async function run(options: RunOptions): Promise<RunResult> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, options.configFile);

  console.log(`📄 Config: ${options.configFile}`);
  const config = await loadConfig(configPath);
  const overlay = getOverlayConfig(options.env, options.now);

  // Render fully in memory before anything is written
  const makefile = renderMakefile(config, overlay);
  const makefilePath = path.join(cwd, MAKEFILE_PATH);
  await fs.writeFile(makefilePath, makefile, 'utf-8');

  const buildDir = path.join(cwd, BUILD_DIR);
  await ensureOutputDir(buildDir);

  const buildableCount = config.videos.filter((video) => !hasAttribute(video, 'not-a-build')).length;
  console.log(`✅ ${MAKEFILE_PATH} written ^_^`);
  console.log(`   Clips: ${config.videos.length} (${buildableCount} in ${FINAL_OUTPUT})`);
  console.log(`   Post date: ${overlay.postDate}`);

  return {
    makefilePath,
    buildDir,
    clipCount: config.videos.length,
    buildableCount,
    postDate: overlay.postDate,
  };
}
