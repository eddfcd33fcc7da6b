import { FormatError } from './errors.js';

const LIST_SEPARATOR = ',';
const PAIR_SEPARATOR = ':';

/**
 * Which compact list is being decoded (used in error messages)
 */
export type CompactListKind = 'mount point' | 'volume';

/**
 * A decoded `first:second` entry
 */
export type CompactPair = readonly [first: string, second: string];

/**
 * Binding of a named volume to a path inside the container
 */
export interface MountPoint {
  sourceVolume: string;
  containerPath: string;
}

/**
 * Named task volume backed by a host path
 */
export interface Volume {
  name: string;
  host: {
    sourcePath: string;
  };
}

/**
 * Decode `"a:b,c:d"` into `[['a', 'b'], ['c', 'd']]`
 *
 * Blank input decodes to an empty list. Segments and components are trimmed.
 * Every segment must hold exactly one separator with text on both sides,
 * otherwise the whole list is rejected.
 */
export function parseCompactPairs(spec: string | undefined, kind: CompactListKind): CompactPair[] {
  if (spec === undefined || spec.trim() === '') {
    return [];
  }

  return spec.split(LIST_SEPARATOR).map((raw, position) => {
    const segment = raw.trim();
    const parts = segment.split(PAIR_SEPARATOR).map((part) => part.trim());
    const [first, second] = parts;

    if (parts.length !== 2 || !first || !second) {
      throw new FormatError(
        `Malformed ${kind} entry #${position + 1} "${segment}": expected name${PAIR_SEPARATOR}path`,
        segment,
        position
      );
    }

    return [first, second] as const;
  });
}

/**
 * Decode a `volumeName:containerPath` list
 */
export function parseMountPoints(spec: string | undefined): MountPoint[] {
  return parseCompactPairs(spec, 'mount point').map(([sourceVolume, containerPath]) => ({
    sourceVolume,
    containerPath,
  }));
}

/**
 * Decode a `volumeName:hostSourcePath` list
 */
export function parseVolumes(spec: string | undefined): Volume[] {
  return parseCompactPairs(spec, 'volume').map(([name, sourcePath]) => ({
    name,
    host: { sourcePath },
  }));
}
