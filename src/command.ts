import type { ClipInput, ClipSpec, RenderedClip, VideoConfig } from './types.js';
import { formatFilterComplex } from './filter.js';

export const DEFAULT_VIDEO_FILTER = 'scale=720x1280,setsar=1:1';
export const DEFAULT_AUDIO_CODEC = 'aac';
export const DEFAULT_VIDEO_CODEC = 'h264';

export function hasAttribute(clip: ClipSpec, attribute: string): boolean {
  return (clip.attributes ?? []).includes(attribute);
}

export function joinList(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(' ') : value;
}

function inputArgs(input: ClipInput): string[] {
  if (typeof input === 'string') {
    return ['-i', input];
  }
  const { i, ...flags } = input;
  return [...Object.entries(flags).map(([flag, value]) => `-${flag} ${value}`), `-i ${i}`];
}

/**
 * Build the ffmpeg command line for one clip
 */
export function buildClipCommand(clip: ClipSpec): string {
  const result = ['ffmpeg', '-hide_banner'];
  const noAudio = hasAttribute(clip, 'no-audio');
  const noVideo = hasAttribute(clip, 'no-video');

  const inputs = Array.isArray(clip.input) ? clip.input : [clip.input];
  inputs.forEach((input) => result.push(...inputArgs(input)));

  if (clip.filter_complex !== undefined) {
    result.push('-filter_complex');
    // A literal string is quoted by the author; rendered chains get double quotes
    result.push(
      typeof clip.filter_complex === 'string'
        ? clip.filter_complex
        : `"${formatFilterComplex(clip.filter_complex)}"`
    );
    if (!noAudio) result.push('-map', '[audio]');
    if (!noVideo) result.push('-map', '[video]');
  } else {
    result.push('-vf', DEFAULT_VIDEO_FILTER);
  }

  if (!noAudio) result.push('-c:a', clip.codec?.audio ?? DEFAULT_AUDIO_CODEC);
  if (!noVideo) result.push('-c:v', clip.codec?.video ?? DEFAULT_VIDEO_CODEC);

  result.push('-map_metadata', '-1');

  if (hasAttribute(clip, 'vsync')) {
    result.push('-vsync 2');
  }

  if (clip.movflags !== undefined) {
    result.push(`-movflags ${joinList(clip.movflags)}`);
  }

  result.push('-y', clip.output);
  return result.join(' ');
}

export function renderClip(spec: ClipSpec): RenderedClip {
  return { spec, command: buildClipCommand(spec) };
}

export function renderClips(config: VideoConfig): RenderedClip[] {
  return config.videos.map(renderClip);
}
