import { z } from 'zod';

export type AuthMethod = 'header' | 'query';

/** One model × auth combination; tried in list order. */
export interface GenerativeEndpoint {
  model: string;
  authMethod: AuthMethod;
}

export const GenerateContentResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
    finishReason: z.string().optional(),
  })).optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

export interface GenerativeResponse {
  model: string;
  authMethod: AuthMethod;
  /** Attempts made across all endpoints, including the successful one */
  attempts: number;
  body: GenerateContentResponse;
}

export type GenerativeFailureReason = 'all_attempts_failed' | 'forbidden' | 'missing_api_key';

export interface ConnectionCheck {
  success: boolean;
  model?: string;
  message: string;
}

/**
 * Text of the first part of the first candidate, or null when absent/blank.
 */
export function extractCandidateText(body: GenerateContentResponse): string | null {
  const text = body.candidates?.[0]?.content?.parts?.[0]?.text;
  return text && text.trim() ? text : null;
}
