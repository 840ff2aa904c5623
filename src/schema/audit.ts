import { z } from 'zod';

export const AuditOutcomeSchema = z.enum(['success', 'error']);

export const AuditDetailsSchema = z.object({
    arguments: z.record(z.unknown()).optional(),
    outcome: AuditOutcomeSchema,
    message: z.string(),
    durationMs: z.number().int().nonnegative()
});

export const AuditLogSchema = z.object({
    id: z.number().int(),
    action: z.string().min(1),
    target: z.string().nullable(),
    details: AuditDetailsSchema,
    timestamp: z.string().datetime()
});

export type AuditOutcome = z.infer<typeof AuditOutcomeSchema>;
export type AuditDetails = z.infer<typeof AuditDetailsSchema>;
export type AuditLog = z.infer<typeof AuditLogSchema>;

/** Row shape as stored; `details` is a JSON string. */
export const AuditLogRowSchema = z.object({
    id: z.number().int(),
    action: z.string(),
    target: z.string().nullable(),
    details: z.string(),
    timestamp: z.string()
});
