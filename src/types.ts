/**
 * A single filter function, e.g. `{ trim: { start: '1.5', end: '4.5' } }`.
 * Must have exactly one key; checked by `formatFunction`.
 */
export type FilterUnit = Record<string, unknown>;

export type FilterScalar = string | number | boolean;

/** Shape of the value under a filter unit's function name */
export type FilterArgs =
  | { kind: 'mapping'; pairs: Array<[string, FilterScalar]> }
  | { kind: 'list'; fragments: FilterScalar[] }
  | { kind: 'scalar'; value: FilterScalar };

export interface FilterStage {
  istream: string;
  func: FilterUnit;
  ostream: string;
}

export type FilterComplexEntry = string | FilterStage;

/**
 * Input with per-input flags, e.g. `{ ss: '00:01', t: 5, i: 'a.mp4' }`.
 * Every key but `i` becomes `-key value` ahead of `-i`.
 */
export interface InputOptions {
  i: string;
  [flag: string]: string | number;
}

export type ClipInput = string | InputOptions;

export interface CodecOptions {
  audio?: string;
  video?: string;
}

export interface ClipSpec {
  input: string | ClipInput[];
  output: string;
  filter_complex?: string | FilterComplexEntry[];
  codec?: CodecOptions;
  attributes?: string[];
  require?: string | string[];
  movflags?: string | string[];
}

export interface VideoConfig {
  videos: ClipSpec[];
}

export interface RenderedClip {
  spec: ClipSpec;
  command: string;
}

export interface FinalBuild {
  deps: string[];
  inputs: string[];
  videoStreams: string[];
  audioStreams: string[];
  streamCount: number;
  rule: string;
}
