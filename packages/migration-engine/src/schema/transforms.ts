/**
 * Transform Registry
 *
 * Fixed table of pure value transforms a mapping rule can reference by name.
 * Names are resolved when a schema is loaded; an unknown name never reaches
 * the mapper. Every transform takes null or a missing value and returns null.
 */

import type { ResolvedTransform } from '@adshift/core';
import { isPlainObject, parseDecimal } from '@adshift/core';

export type TransformName =
  | 'divide_by_100'
  | 'extract_creative_data'
  | 'extract_tweet_creative_data'
  | 'trim'
  | 'lowercase'
  | 'uppercase';

type TransformFn = (value: unknown) => unknown;

interface CreativeKeys {
  photoUrl: string;
  title: string;
}

function divideBy(divisor: number): TransformFn {
  return (value) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return value / divisor;
    if (typeof value === 'string') {
      const parsed = parseDecimal(value);
      return parsed === undefined ? value : parsed / divisor;
    }
    // Left for the cast step to reject
    return value;
  };
}

/**
 * Flatten platform creatives into `{ photo_url, title }` pairs
 */
function flattenCreatives(keys: CreativeKeys): TransformFn {
  return (value) => {
    if (!Array.isArray(value)) return null;

    return value.filter(isPlainObject).map((creative) => ({
      photo_url: creative[keys.photoUrl] ?? null,
      title: creative[keys.title] ?? null,
    }));
  };
}

function mapString(fn: (value: string) => string): TransformFn {
  return (value) => {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? fn(value) : value;
  };
}

const TRANSFORMS: Record<TransformName, TransformFn> = {
  divide_by_100: divideBy(100),
  extract_creative_data: flattenCreatives({ photoUrl: 'image_url', title: 'headline' }),
  extract_tweet_creative_data: flattenCreatives({ photoUrl: 'media_url', title: 'text' }),
  trim: mapString((v) => v.trim()),
  lowercase: mapString((v) => v.toLowerCase()),
  uppercase: mapString((v) => v.toUpperCase()),
};

export const TRANSFORM_NAMES = Object.keys(TRANSFORMS).filter(isTransformName);

export function isTransformName(name: string): name is TransformName {
  return Object.prototype.hasOwnProperty.call(TRANSFORMS, name);
}

/**
 * Look up a transform by name
 * @returns undefined when no transform is registered under the name
 */
export function resolveTransform(name: string): ResolvedTransform | undefined {
  if (!isTransformName(name)) {
    return undefined;
  }

  const fn = TRANSFORMS[name];
  return {
    name,
    apply(value: unknown): unknown {
      return fn(value === undefined ? null : value);
    },
  };
}
