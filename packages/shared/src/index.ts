import { z } from 'zod';

export const FALLBACK_ANSWER = "I couldn't find an answer, please try again.";

export const askRequestSchema = z.object({
  question: z.string(),
  messages: z.array(z.unknown())
});

export const askResponseSchema = z.object({
  answer: z.string()
});

export const askFailureSchema = z.object({
  error: z.string(),
  answer: z.literal(FALLBACK_ANSWER)
});

export const healthSchema = z.object({
  ok: z.literal(true),
  service: z.string(),
  cache: z.string().nullable()
});

export type AskRequest = z.infer<typeof askRequestSchema>;
export type AskResponse = z.infer<typeof askResponseSchema>;
export type AskFailure = z.infer<typeof askFailureSchema>;
export type HealthResponse = z.infer<typeof healthSchema>;

export const toAskFailure = (error: unknown): AskFailure => ({
  error: error instanceof Error ? error.message : 'Unknown error',
  answer: FALLBACK_ANSWER
});
