/**
 * Request body schemas for the user-facing routes
 */

import { z } from "zod";

const WeightSchema = z.number().finite();
const NameSchema = z.string().trim().min(1).max(200);
const FreshnessModeSchema = z.enum(["breaking", "daily", "weekly"]);

export const InteractionSchema = z.object({
  articleId: NameSchema,
  opened: z.boolean().default(false),
  readDurationSeconds: z.number().finite().min(0).default(0),
  explicitRating: z.union([z.literal(-1), z.literal(0), z.literal(1)]).default(0),
  saved: z.boolean().default(false),
  dismissed: z.boolean().default(false),
  occurredAt: z.coerce.date().optional(),
});

export const FeedbackSchema = z.object({
  articleId: NameSchema,
  feedback: z.enum(["like", "dislike", "save", "dismiss"]),
});

export const OnboardingSchema = z.object({
  topics: z.array(NameSchema).max(100),
  sources: z.array(NameSchema).max(100).optional(),
  dailyLimit: z.number().int().min(1).max(100).optional(),
  freshnessMode: FreshnessModeSchema.optional(),
});

// Out-of-range weights are accepted and clamped, not rejected
export const PreferencesPatchSchema = z
  .object({
    topicWeights: z.record(WeightSchema),
    sourceWeights: z.record(WeightSchema),
    excludeTopics: z.array(NameSchema),
    excludeSources: z.array(NameSchema),
    freshnessMode: FreshnessModeSchema,
    diversityBoost: WeightSchema,
    dailyLimit: z.number().int().min(1),
    autoAdjust: z.boolean(),
  })
  .partial()
  .strict();

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
