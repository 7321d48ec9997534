import logger from './logger.js';

/** Close any braces/brackets left open by a truncated response. */
export function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const body = inString ? `${s}"` : s;
  return body.replace(/,\s*$/, '') + stack.reverse().join('');
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse one candidate JSON payload, repairing the usual model quirks:
 * trailing commas, single-quoted strings, unquoted keys, truncation.
 *
 * Unlike a full extractor this does not hunt for the payload inside prose;
 * callers hand it the slice they believe is JSON. Returns undefined on failure.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return undefined;

  const cleaned = text.trim();
  if (!cleaned) return undefined;

  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const withoutTrailing = tryParse(noTrailing);
  if (withoutTrailing !== undefined) return withoutTrailing;

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return undefined;
  }

  const aggressive = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
  const fromAggressive = tryParse(aggressive);
  if (fromAggressive !== undefined) return fromAggressive;

  const quotedKeys = aggressive.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const fromQuoted = tryParse(quotedKeys);
  if (fromQuoted !== undefined) return fromQuoted;

  const closed = closePartial(quotedKeys);
  if (closed !== quotedKeys) {
    const fromClosed = tryParse(closed);
    if (fromClosed !== undefined) return fromClosed;
  }

  return undefined;
}
