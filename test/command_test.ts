import { test, describe } from 'node:test';
import assert from 'node:assert';
import { buildClipCommand, renderClip, renderClips } from '../src/command.js';
import type { ClipSpec } from '../src/types.js';

describe('buildClipCommand', () => {
  test('should use the default filter and codecs without a filter chain', () => {
    const command = buildClipCommand({ input: 'a.mp4', output: 'build/a.mp4' });

    assert.strictEqual(
      command,
      'ffmpeg -hide_banner -i a.mp4 -vf scale=720x1280,setsar=1:1 -c:a aac -c:v h264 -map_metadata -1 -y build/a.mp4'
    );
  });

  test('should drop audio flags for no-audio clips', () => {
    const command = buildClipCommand({ input: 'a.mp4', output: 'build/a.mp4', attributes: ['no-audio'] });

    assert.strictEqual(
      command,
      'ffmpeg -hide_banner -i a.mp4 -vf scale=720x1280,setsar=1:1 -c:v h264 -map_metadata -1 -y build/a.mp4'
    );
    assert.ok(!command.includes('-c:a'));
    assert.ok(!command.includes('-map [audio]'));
  });

  test('should put per-input flags before -i without mutating the input', () => {
    const clip: ClipSpec = {
      input: [{ ss: '00:00:05', t: 10, i: 'a.mp4' }, 'b.mp4'],
      output: 'build/ab.mp4',
    };

    const command = buildClipCommand(clip);

    assert.ok(command.startsWith('ffmpeg -hide_banner -ss 00:00:05 -t 10 -i a.mp4 -i b.mp4 -vf '));
    assert.deepStrictEqual(clip.input, [{ ss: '00:00:05', t: 10, i: 'a.mp4' }, 'b.mp4']);
  });

  test('should render a structured filter chain in double quotes and map both streams', () => {
    const command = buildClipCommand({
      input: ['a.mp4'],
      output: 'build/b.mp4',
      filter_complex: [
        { istream: '[0:v]', func: { trim: { start: '1', end: '3' } }, ostream: '[video]' },
        { istream: '[0:a]', func: { atrim: { start: '1', end: '3' } }, ostream: '[audio]' },
      ],
      codec: { audio: 'libopus', video: 'libx264' },
      attributes: ['vsync'],
      movflags: ['+faststart'],
    });

    assert.strictEqual(
      command,
      'ffmpeg -hide_banner -i a.mp4 -filter_complex "[0:v]trim=start=1:end=3[video];[0:a]atrim=start=1:end=3[audio]"' +
        ' -map [audio] -map [video] -c:a libopus -c:v libx264 -map_metadata -1 -vsync 2 -movflags +faststart -y build/b.mp4'
    );
  });

  test('should pass a literal filter_complex string through unquoted', () => {
    const command = buildClipCommand({
      input: 'a.mp4',
      output: 'build/c.mp4',
      filter_complex: "'[0:v]hflip[video]'",
      attributes: ['no-audio'],
    });

    assert.strictEqual(
      command,
      "ffmpeg -hide_banner -i a.mp4 -filter_complex '[0:v]hflip[video]' -map [video] -c:v h264 -map_metadata -1 -y build/c.mp4"
    );
  });

  test('should only map audio for no-video clips', () => {
    const command = buildClipCommand({
      input: 'a.mp4',
      output: 'build/a.m4a',
      filter_complex: '[0:a]volume=2[audio]',
      attributes: ['no-video'],
    });

    assert.strictEqual(
      command,
      'ffmpeg -hide_banner -i a.mp4 -filter_complex [0:a]volume=2[audio] -map [audio] -c:a aac -map_metadata -1 -y build/a.m4a'
    );
  });

  test('should join several movflags with spaces', () => {
    const command = buildClipCommand({ input: 'a.mp4', output: 'o.mp4', movflags: ['+faststart', '+frag_keyframe'] });

    assert.ok(command.endsWith('-map_metadata -1 -movflags +faststart +frag_keyframe -y o.mp4'));
  });

  test('should pass a movflags string through as-is', () => {
    const command = buildClipCommand({ input: 'a.mp4', output: 'o.mp4', movflags: '+faststart' });

    assert.strictEqual(
      command,
      'ffmpeg -hide_banner -i a.mp4 -vf scale=720x1280,setsar=1:1 -c:a aac -c:v h264 -map_metadata -1 -movflags +faststart -y o.mp4'
    );
  });
});

describe('renderClip', () => {
  test('should pair the spec with its command and leave the spec untouched', () => {
    const clip: ClipSpec = { input: 'a.mp4', output: 'build/a.mp4' };

    const rendered = renderClip(clip);

    assert.strictEqual(rendered.spec, clip);
    assert.strictEqual(rendered.command, buildClipCommand(clip));
    assert.deepStrictEqual(Object.keys(clip), ['input', 'output']);
  });

  test('should render every clip in order', () => {
    const rendered = renderClips({
      videos: [
        { input: 'a.mp4', output: 'build/a.mp4' },
        { input: 'b.mp4', output: 'build/b.mp4' },
      ],
    });

    assert.deepStrictEqual(
      rendered.map((clip) => clip.spec.output),
      ['build/a.mp4', 'build/b.mp4']
    );
  });
});
