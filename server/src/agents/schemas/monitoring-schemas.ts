import { z } from 'zod';
import { bounded, lenientArray, stringList, text } from './shared.js';

// ─── sentiment ────────────────────────────────────────────────────────

export const SentimentScoreSchema = z.object({
  /** Position of the scored communication, 0 = most recent. */
  index: z.number().int().nonnegative().optional().catch(undefined),
  sentiment: bounded(-1, 1),
  signals: stringList,
  summary: text,
});

export type SentimentScore = z.infer<typeof SentimentScoreSchema>;

export const SentimentSchema = z.object({
  scores: lenientArray(SentimentScoreSchema).catch([]),
  overall_sentiment: bounded(-1, 1).optional().catch(undefined),
  key_concerns: stringList,
  positive_signals: stringList,
}).refine(
  (value) => value.scores.length > 0 || value.overall_sentiment !== undefined,
  { message: 'sentiment output carries neither item scores nor an overall figure' },
);

export type SentimentOutput = z.infer<typeof SentimentSchema>;

// ─── recovery ─────────────────────────────────────────────────────────

export const RecoverySchema = z.object({
  recovery_email: z.string(),
  recovery_actions: stringList,
});

export type RecoveryOutput = z.infer<typeof RecoverySchema>;
