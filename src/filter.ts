import type { FilterArgs, FilterComplexEntry, FilterScalar, FilterUnit } from './types.js';
import { FilterFormatError, describeType } from './errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is FilterScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Classify the value under a function name into one of the supported shapes
 */
export function classifyArgs(name: string, value: unknown): FilterArgs {
  if (isRecord(value)) {
    const pairs = Object.entries(value).map(([key, arg]): [string, FilterScalar] => {
      if (!isScalar(arg)) {
        throw new FilterFormatError(`Unknown type "${describeType(arg)}" for ${name}.${key}`);
      }
      return [key, arg];
    });
    return { kind: 'mapping', pairs };
  }

  if (Array.isArray(value)) {
    const fragments = value.map((fragment: unknown, index) => {
      if (!isScalar(fragment)) {
        throw new FilterFormatError(`Unknown type "${describeType(fragment)}" in ${name}[${index}]`);
      }
      return fragment;
    });
    return { kind: 'list', fragments };
  }

  if (isScalar(value)) {
    return { kind: 'scalar', value };
  }

  throw new FilterFormatError(`Unknown type "${describeType(value)}" from ${name}`);
}

function renderArgs(args: FilterArgs): string {
  switch (args.kind) {
    case 'mapping':
      return args.pairs.map(([key, value]) => `${key}=${value}`).join(':');
    case 'list':
      return args.fragments.join(':');
    case 'scalar':
      return String(args.value);
  }
}

/**
 * Render a single filter unit into a filter_complex function expression.
 *
 * Both of these render as `trim=start=1.15:end=4.5`:
 *
 *   { trim: { start: '1.15', end: '4.5' } }
 *   { trim: ['start=1.15', 'end=4.5'] }
 *
 * List fragments are not inspected, so `{ fade: ['in', 'st=1', 'd=3'] }`
 * gives `fade=in:st=1:d=3`. An empty value renders as `name=`.
 *
 * Mapping pairs follow JavaScript property order: integer-like keys come
 * first in ascending order, so `{ pan: { mono: '', '0': 'c0' } }` gives
 * `pan=0=c0:mono=`. Use the list form when such keys must keep their place.
 */
export function formatFunction(unit: FilterUnit): string {
  if (!isRecord(unit)) {
    throw new FilterFormatError(`Filter unit must be an object, got "${describeType(unit)}"`);
  }
  const names = Object.keys(unit);
  if (names.length !== 1) {
    throw new FilterFormatError(
      `Filter unit must have exactly 1 key (the function name), got ${names.length}: [${names.join(', ')}]`
    );
  }

  const [name] = names;
  return `${name}=${renderArgs(classifyArgs(name, unit[name]))}`;
}

/**
 * Join filter_complex entries with `;`.
 * Raw strings pass through untouched; the result is not quoted.
 */
export function formatFilterComplex(entries: FilterComplexEntry[]): string {
  return entries
    .map((entry) =>
      typeof entry === 'string' ? entry : entry.istream + formatFunction(entry.func) + entry.ostream
    )
    .join(';');
}
