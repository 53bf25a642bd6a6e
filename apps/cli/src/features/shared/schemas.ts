import { normalizeAssetSymbol } from '@swaptrace/core';
import { CHAIN_REGISTRY } from '@swaptrace/ingestion';
import { z } from 'zod';

const ChainNameSchema = z
  .string()
  .trim()
  .min(1, '--chain is required')
  .transform((value) => value.toLowerCase())
  .superRefine((value, ctx) => {
    const result = CHAIN_REGISTRY.require(value);
    if (result.isErr()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    }
  });

export const DatabasePathSchema = z.object({
  db: z.string().trim().min(1, '--db must not be empty').optional(),
});

/**
 * trades command options. Commander sets `prices: false` for --no-prices.
 */
export const TradesCommandOptionsSchema = DatabasePathSchema.extend({
  address: z.string().trim().min(1, '--address must not be empty').optional(),
  chain: ChainNameSchema,
  offline: z.boolean().default(false),
  prices: z.boolean().default(true),
});

export const TradesArgumentsSchema = z.object({
  dumpFile: z.string().trim().min(1, 'A dump file is required'),
});

export const BackfillCommandOptionsSchema = DatabasePathSchema;

export const AssetSymbolSchema = z
  .string()
  .trim()
  .min(1, 'An asset symbol is required')
  .regex(/^[A-Za-z0-9.]+$/, 'Asset symbol must be letters, digits or dots')
  .transform(normalizeAssetSymbol);

export type TradesCommandOptions = z.infer<typeof TradesCommandOptionsSchema>;
export type BackfillCommandOptions = z.infer<typeof BackfillCommandOptionsSchema>;

/**
 * First issue of a failed parse, as shown to the user
 */
export function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid options';
}
