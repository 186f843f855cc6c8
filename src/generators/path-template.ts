/**
 * Path templating - replaces variable path segments with placeholders
 *
 * A segment is variable when it looks like an identifier, or when, among
 * paths with the same method and segment count that agree everywhere else,
 * it takes at least `varianceThreshold` distinct values. The first segment
 * is never templated by variance alone, so `/users` and `/orders` stay apart.
 */

import { createRecord } from '../core/records.js';

export interface PathSample {
  method: string;
  path: string;
}

export interface TemplatedPath {
  template: string;
  /** Placeholder name -> concrete segment value */
  params: Record<string, string>;
}

const WILDCARD = '\u0000';

/**
 * Check if a segment looks like an ID (numeric, UUID, object id, token)
 */
export function looksLikeId(segment: string): boolean {
  // Numeric ID
  if (/^\d+$/.test(segment)) return true;

  // UUID
  if (/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(segment)) return true;

  // MongoDB ObjectId or nanoid
  if (/^[0-9a-f]{24}$/i.test(segment)) return true;
  if (/^[a-zA-Z0-9_-]{21}$/.test(segment) && /\d/.test(segment)) return true;

  // Long hex digests
  if (/^[0-9a-f]{16,}$/i.test(segment)) return true;

  // Token-like: long, mixes letters and digits
  if (segment.length >= 16 && /^[a-zA-Z0-9_-]+$/.test(segment) && /\d/.test(segment) && /[a-zA-Z]/.test(segment)) {
    return true;
  }

  return false;
}

/**
 * Placeholder names: id, id2, id3, ...
 */
export function placeholderName(position: number): string {
  return position === 0 ? 'id' : `id${position + 1}`;
}

export function splitPath(path: string): string[] {
  return path.split('/').filter(Boolean);
}

/**
 * Template every sample. The result is aligned with the input by index.
 */
export function templatePaths(samples: readonly PathSample[], varianceThreshold: number): TemplatedPath[] {
  const segments = samples.map((sample) => splitPath(sample.path));
  const masked = segments.map((parts) => parts.map((part) => (looksLikeId(part) ? WILDCARD : part)));

  if (varianceThreshold >= 2) {
    collapseVariance(samples, masked, varianceThreshold);
  }

  return segments.map((parts, index) => buildTemplate(parts, masked[index]));
}

/**
 * Mark positions that vary across otherwise identical paths, until nothing changes
 */
function collapseVariance(samples: readonly PathSample[], masked: string[][], threshold: number): void {
  let changed = true;

  while (changed) {
    changed = false;
    const buckets = new Map<string, { members: number[]; values: Set<string> }>();

    masked.forEach((parts, index) => {
      for (let position = 1; position < parts.length; position++) {
        if (parts[position] === WILDCARD) continue;

        const signature = [
          samples[index].method,
          position,
          ...parts.map((part, i) => (i === position ? WILDCARD : part)),
        ].join('/');

        let bucket = buckets.get(signature);
        if (!bucket) {
          bucket = { members: [], values: new Set() };
          buckets.set(signature, bucket);
        }
        bucket.members.push(index);
        bucket.values.add(parts[position]);
      }
    });

    for (const [signature, bucket] of buckets) {
      if (bucket.values.size < threshold) continue;
      const position = Number(signature.split('/')[1]);
      for (const index of bucket.members) {
        if (masked[index][position] !== WILDCARD) {
          masked[index][position] = WILDCARD;
          changed = true;
        }
      }
    }
  }
}

function buildTemplate(parts: string[], masked: string[]): TemplatedPath {
  const params = createRecord<string>();
  let placeholders = 0;

  const templated = parts.map((part, i) => {
    if (masked[i] !== WILDCARD) return part;
    const name = placeholderName(placeholders++);
    params[name] = safeDecode(part);
    return `{${name}}`;
  });

  return { template: `/${templated.join('/')}`, params };
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
