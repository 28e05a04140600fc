/**
 * Parameter Validation
 * zod schemas for the public surface; failures become ConfigurationError
 */

import { z } from 'zod';
import { getAddress, isAddress, isHexString } from 'ethers';
import { ConfigurationError } from './errors';

export const MAX_MARKING = 0xffffff;
export const MAX_PROTECTION_WORD = 0xffffffff;

/** Any address spelling in, checksummed address out */
export const addressSchema = z
  .string()
  .refine((value) => isAddress(value), { message: 'Invalid address' })
  .transform((value) => getAddress(value));

export const positiveAmountSchema = z.bigint().positive();
export const nonNegativeAmountSchema = z.bigint().nonnegative();
export const uint64Schema = z.bigint().nonnegative().max((1n << 64n) - 1n);

export const markingSchema = z.number().int().min(0).max(MAX_MARKING);
export const protectionWordSchema = z.number().int().min(0).max(MAX_PROTECTION_WORD);

export const bytes32Schema = z
  .string()
  .refine((value) => isHexString(value, 32), { message: 'Expected 32-byte hex string' });

export const hexBytesSchema = z
  .string()
  .refine((value) => isHexString(value), { message: 'Expected hex string' });

export const batchWindowSchema = z
  .object({
    cycleLength: z.number().int().positive(),
    settlementBlocks: z.number().int().nonnegative(),
    enabled: z.boolean(),
  })
  .refine((window) => window.settlementBlocks <= window.cycleLength, {
    message: 'settlementBlocks must not exceed cycleLength',
  });

/**
 * Parse a value, converting schema failures into ConfigurationError.
 */
export function parseParam<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  field: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid ${field}: ${detail}`, 'INVALID_PARAMETER');
  }
  return result.data;
}
