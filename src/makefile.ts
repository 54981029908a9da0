import type { VideoConfig } from './types.js';
import { joinList, renderClips } from './command.js';
import { FINAL_OUTPUT, buildFinalRule } from './final.js';
import type { OverlayConfig } from './overlay.js';

export const MAKEFILE_HEADER = `
all: ${FINAL_OUTPUT}

clean:
\trm -fv build/*.mp4

`;

/**
 * Render the whole Makefile: header, one rule per clip, then the final rule.
 * Does not touch the filesystem.
 */
export function renderMakefile(config: VideoConfig, overlay: OverlayConfig): string {
  const clips = renderClips(config);
  let result = MAKEFILE_HEADER;

  for (const { spec, command } of clips) {
    result += `${spec.output}: ${joinList(spec.require)}\n\t${command}\n\n`;
  }

  result += buildFinalRule(clips, overlay).rule;
  return result;
}
