// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS — Request Validation for the Verification API
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const MAX_CLAIM_LENGTH = 5000;

/**
 * Whitespace-only claims are rejected, but the claim itself is passed on
 * untrimmed.
 *
 * @example
 * POST /api/verify
 * { "claim": "The Eiffel Tower is located in Paris." }
 */
export const VerifyRequestSchema = z.object({
  claim: z
    .string({ required_error: 'Claim is required', invalid_type_error: 'Claim must be a string' })
    .max(MAX_CLAIM_LENGTH, `Claim must be ${MAX_CLAIM_LENGTH} characters or less`)
    .refine(claim => claim.trim().length > 0, 'Claim is required'),
});

export type VerifyRequest = z.infer<typeof VerifyRequestSchema>;

/** Values above the retention limit are clamped by the route. */
export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int('Limit must be an integer').positive('Limit must be positive').optional(),
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
