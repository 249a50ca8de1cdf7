import { z } from 'zod';

/**
 * Input schemas for ledger operations.
 * Amounts are bigint minor units; timestamps are Unix seconds.
 */

export const AccountIdSchema = z.string().trim().min(1).max(128);

export const FlightNumberSchema = z.string().trim().min(1).max(16);

export const UnixSecondsSchema = z.number().int().nonnegative();

export const PolicyIdSchema = z.number().int().positive();

export const AmountSchema = z.bigint();

export const FlightStatusSchema = z.enum(['OnTime', 'Delayed', 'Cancelled', 'Departed']);

export const CreatePolicyInputSchema = z.object({
    holder: AccountIdSchema,
    flightNumber: FlightNumberSchema,
    scheduledDeparture: UnixSecondsSchema,
    maxPayout: AmountSchema,
    premiumPaid: AmountSchema
});

export const FlightStatusUpdateSchema = z.object({
    flightStatus: FlightStatusSchema,
    actualDeparture: UnixSecondsSchema,
    caller: AccountIdSchema
});

const DelayBoundSchema = z.union([
    z.number().int().nonnegative(),
    z.literal(Number.POSITIVE_INFINITY)
]);

export const PayoutTierSchema = z.object({
    minDelay: z.number().int().nonnegative(),
    maxDelay: DelayBoundSchema,
    multiplier: z.number().int().nonnegative()
});

/**
 * Tier list as it appears in configuration JSON, where `null` stands for
 * an open-ended upper bound.
 */
export const PayoutTierConfigSchema = z.array(z.object({
    minDelay: z.number().int().nonnegative(),
    maxDelay: z.number().int().nonnegative().nullable(),
    multiplier: z.number().int().nonnegative()
}));

export type CreatePolicyInput = z.infer<typeof CreatePolicyInputSchema>;
export type FlightStatusUpdateInput = z.infer<typeof FlightStatusUpdateSchema>;
export type PayoutTierInput = z.infer<typeof PayoutTierSchema>;
