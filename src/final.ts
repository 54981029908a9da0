import type { FinalBuild, RenderedClip } from './types.js';
import { formatFunction } from './filter.js';
import { hasAttribute } from './command.js';
import { type OverlayConfig, dateOverlay } from './overlay.js';

export const FINAL_OUTPUT = 'build/final.mp4';

/**
 * Build the Makefile rule that concatenates every buildable clip into
 * build/final.mp4. Clips flagged `not-a-build` are skipped and do not
 * consume a stream index.
 */
export function buildFinalRule(clips: RenderedClip[], overlay: OverlayConfig): FinalBuild {
  const deps: string[] = [];
  const inputs: string[] = [];
  const videoStreams: string[] = [];
  const audioStreams: string[] = [];

  for (const { spec } of clips) {
    if (hasAttribute(spec, 'not-a-build')) continue;
    const index = deps.length;
    deps.push(spec.output);
    inputs.push(`-i ${spec.output}`);
    videoStreams.push(`[${index}:v]`);
    audioStreams.push(`[${index}:a]`);
  }

  const streamCount = deps.length;
  const date = formatFunction(dateOverlay(overlay));
  const filter =
    `${videoStreams.join('')}concat=n=${streamCount},${date}[video];` +
    `${audioStreams.join('')}concat=v=0:a=1:n=${streamCount}[audio]`;

  const depList = deps.map((dep) => ` ${dep}`).join('');
  const inputList = inputs.map((input) => ` ${input}`).join('');
  const rule =
    `${FINAL_OUTPUT}:${depList}\n` +
    `\tffmpeg -hide_banner${inputList} -filter_complex "${filter}"` +
    ` -map [video] -map [audio] -map_metadata -1 -c:v h264 -c:a aac -vsync 2 -y ${FINAL_OUTPUT}` +
    '\n\n';

  return { deps, inputs, videoStreams, audioStreams, streamCount, rule };
}
