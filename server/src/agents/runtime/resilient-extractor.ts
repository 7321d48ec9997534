/**
 * ResilientExtractor: turns a raw reasoning response into a typed record.
 *
 * Candidates are produced by an ordered chain of pure strategies, each
 * repaired (repairJSON) and validated against the shape's zod schema. The
 * first candidate that validates wins. When none does, the shape's fallback
 * is returned together with an issue message. `extract` never throws.
 */

import type { z } from 'zod';
import { repairJSON } from '../../lib/json-repair.js';
import logger from '../../lib/logger.js';

export interface ExtractionShape<T> {
  /** Used in issue messages and logs. */
  name: string;
  /** A key the wanted object always carries, used to find it inside prose. */
  marker: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  fallback: () => T;
}

export type StrategyName = 'labelledFence' | 'anyFence' | 'markedObject' | 'wholeText';

export interface ExtractionStrategy {
  name: StrategyName;
  /** Returns the candidate JSON text, or null when the strategy does not apply. */
  locate(text: string, marker: string): string | null;
}

export interface ExtractionOutcome<T> {
  value: T;
  strategy: StrategyName | 'fallback';
  /** Set when the fallback was used. */
  issue?: string;
}

// A truncated response may lose its closing fence, so the interior runs to
// the end of the text in that case.
const LABELLED_FENCE = /```json[^\S\n]*\n?([\s\S]*?)(?:```|$)/i;
const ANY_FENCE = /```[\w-]*[^\S\n]*\n?([\s\S]*?)(?:```|$)/;

function fenceInterior(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  const interior = match?.[1]?.trim();
  return interior ? interior : null;
}

/**
 * The outermost object enclosing the first `"marker"`, found in one pass.
 * Quotes only count inside an object, so stray quotes in surrounding prose do
 * not flip string state. An object still open at the end of the text is
 * returned as its tail for the repair step to close.
 */
export function findMarkedObject(text: string, marker: string): string | null {
  const markerAt = text.indexOf(`"${marker}"`);
  if (markerAt === -1) return null;

  const open: number[] = [];
  let outermost = -1;
  let inString = false;
  let escape = false;
  for (let i = 0; i < text.length; i++) {
    if (i === markerAt) {
      outermost = open[0] ?? -1;
      if (outermost === -1) return null;
    }
    const ch = text[i];
    if (open.length === 0) {
      if (ch === '{') open.push(i);
      continue;
    }
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') open.push(i);
    else if (ch === '}') {
      open.pop();
      if (open.length === 0 && i > markerAt) return text.slice(outermost, i + 1);
    }
  }
  return outermost === -1 ? null : text.slice(outermost);
}

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  { name: 'labelledFence', locate: (text) => fenceInterior(text, LABELLED_FENCE) },
  { name: 'anyFence', locate: (text) => fenceInterior(text, ANY_FENCE) },
  { name: 'markedObject', locate: (text, marker) => findMarkedObject(text, marker) },
  { name: 'wholeText', locate: (text) => text.trim() || null },
];

export function extract<T>(
  raw: string,
  shape: ExtractionShape<T>,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): ExtractionOutcome<T> {
  const text = typeof raw === 'string' ? raw : '';

  for (const strategy of strategies) {
    let candidate: unknown;
    try {
      const located = strategy.locate(text, shape.marker);
      if (located === null) continue;
      candidate = repairJSON(located);
    } catch (err) {
      logger.debug({ err, strategy: strategy.name, shape: shape.name }, 'Extraction strategy threw, trying next');
      continue;
    }
    if (candidate === undefined) continue;

    const parsed = shape.schema.safeParse(candidate);
    if (parsed.success) {
      return { value: parsed.data, strategy: strategy.name };
    }
  }

  logger.warn({ shape: shape.name, length: text.length, preview: text.slice(0, 200) }, 'Reasoning output unparseable, using fallback');
  return {
    value: shape.fallback(),
    strategy: 'fallback',
    issue: `Could not parse ${shape.name} output; manual review required`,
  };
}
