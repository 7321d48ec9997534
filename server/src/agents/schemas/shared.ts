/**
 * Field builders shared by the reasoning-output schemas.
 *
 * Model output is unpredictable, so every non-marker field degrades to a
 * neutral value instead of failing the whole object, and numeric fields are
 * clamped into their documented domains whatever the raw value claimed.
 */

import { z } from 'zod';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Accepts numbers and numeric strings ("0.8", "75%"). */
export const numberLike = z.preprocess(
  (value) => (typeof value === 'string' ? Number.parseFloat(value) : value),
  z.number(),
);

/** Required numeric field, clamped into [min, max]. */
export function bounded(min: number, max: number) {
  return numberLike.transform((value) => clamp(value, min, max));
}

/** Optional numeric field: falls back when missing or unparseable, then clamps. */
export function boundedOr(min: number, max: number, fallback: number) {
  return numberLike.catch(fallback).transform((value) => clamp(value, min, max));
}

export const text = z.string().trim().catch('');

/** Array of non-empty strings; non-string entries are dropped. */
export const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

/** Array whose invalid entries are dropped rather than failing the parent. */
export function lenientArray<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.array(z.unknown()).transform((entries) =>
    entries.flatMap((entry) => {
      const parsed = item.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    }),
  );
}
