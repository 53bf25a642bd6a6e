import { parseRawAmount } from '@swaptrace/core';
import { z } from 'zod';

/**
 * Saved explorer dump, shared by every chain family. The EVM layout follows the
 * Etherscan account API (txlist, tokentx, txlistinternal); Solana and Sui dumps
 * reuse the same keys with balance-change rows in `erc20_token_transfers`.
 *
 * Rows are validated one at a time so a single bad row does not sink the dump.
 */
export const ExplorerDumpEnvelopeSchema = z.object({
  address: z.string().min(1, 'Dump address must not be empty'),
  erc20_token_transfers: z.array(z.unknown()).default([]),
  internal_transactions: z.array(z.unknown()).default([]),
  normal_transactions: z.array(z.unknown()).default([]),
});

const NumericSchema = z
  .union([z.string().regex(/^\d+$/, 'Must be a numeric string'), z.number().int().nonnegative()])
  .transform((value) => Number(value));

const RawAmountSchema = z.union([z.string(), z.number(), z.bigint()]).transform((value, ctx) => {
  const amount = parseRawAmount(value);
  if (amount === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Amount must be an integer, got ${String(value)}` });
    return z.NEVER;
  }
  return amount;
});

/** Empty strings and nulls mean "no party" (mints, burns, one-sided balance changes) */
const OptionalAddressSchema = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const HashSchema = z.string().trim().min(1, 'Hash must not be empty');

export const EvmNormalTransactionRowSchema = z.object({
  blockNumber: NumericSchema,
  from: OptionalAddressSchema,
  hash: HashSchema,
  input: z.string().optional(),
  isError: z.string().optional(),
  timeStamp: NumericSchema,
  to: OptionalAddressSchema,
  value: RawAmountSchema.default('0'),
});

export const EvmTokenTransferRowSchema = z.object({
  blockNumber: NumericSchema,
  contractAddress: z.string().trim().min(1, 'Contract address must not be empty'),
  from: OptionalAddressSchema,
  hash: HashSchema,
  timeStamp: NumericSchema,
  to: OptionalAddressSchema,
  tokenDecimal: z.union([z.string(), z.number()]).optional(),
  tokenSymbol: z.string().optional(),
  value: RawAmountSchema,
});

export const EvmInternalTransactionRowSchema = z.object({
  blockNumber: NumericSchema,
  from: OptionalAddressSchema,
  hash: HashSchema,
  isError: z.string().optional(),
  timeStamp: NumericSchema,
  to: OptionalAddressSchema,
  value: RawAmountSchema,
});

export const BalanceChangeTransactionRowSchema = z.object({
  blockNumber: NumericSchema,
  hash: HashSchema,
  success: z.boolean().optional(),
  timeStamp: NumericSchema,
});

export const BalanceChangeRowSchema = z.object({
  blockNumber: NumericSchema.optional(),
  contractAddress: z.string().trim().min(1, 'Mint or coin type must not be empty'),
  from: OptionalAddressSchema,
  hash: HashSchema,
  timeStamp: NumericSchema.optional(),
  to: OptionalAddressSchema,
  value: RawAmountSchema,
});

export type ExplorerDumpEnvelope = z.infer<typeof ExplorerDumpEnvelopeSchema>;
export type EvmNormalTransactionRow = z.infer<typeof EvmNormalTransactionRowSchema>;
export type EvmTokenTransferRow = z.infer<typeof EvmTokenTransferRowSchema>;
export type EvmInternalTransactionRow = z.infer<typeof EvmInternalTransactionRowSchema>;
export type BalanceChangeTransactionRow = z.infer<typeof BalanceChangeTransactionRowSchema>;
export type BalanceChangeRow = z.infer<typeof BalanceChangeRowSchema>;
