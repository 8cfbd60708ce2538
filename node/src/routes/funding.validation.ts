import { z } from 'zod';

// Request body for a conversational funding query
export const fundingQuerySchema = z.object({
  message: z.string().trim().min(1, 'Message is required and cannot be empty').max(2000),
  sessionId: z.string().trim().min(1).max(128).optional(),
  location: z.string().trim().min(1).max(120).optional(),
  domain: z.string().trim().min(1).max(120).optional(),
  fundingNeed: z.coerce.number().nonnegative().optional(),
  mode: z.enum(['standard', 'comprehensive']).optional().default('standard'),
  wanted: z.coerce.number().int().min(1).max(8).optional(),
});

export const sessionRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required').max(128),
});

export type FundingQueryBody = z.infer<typeof fundingQuerySchema>;
export type SessionRequestBody = z.infer<typeof sessionRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Validates a funding query body
 */
export function validateFundingQuery(data: unknown): ValidationResult<FundingQueryBody> {
  return validate(fundingQuerySchema, data);
}

export function validateSessionRequest(data: unknown): ValidationResult<SessionRequestBody> {
  return validate(sessionRequestSchema, data);
}
