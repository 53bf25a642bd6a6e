/**
 * Zod schemas for CoinGecko API responses
 */

import { z } from 'zod';

/**
 * /coins/{id}/history. `market_data` is missing for dates before the coin was listed.
 */
export const CoinGeckoHistoryResponseSchema = z.object({
  id: z.string(),
  symbol: z.string().optional(),
  name: z.string().optional(),
  market_data: z
    .object({
      current_price: z.record(z.string(), z.number()),
    })
    .optional(),
});

export type CoinGeckoHistoryResponse = z.infer<typeof CoinGeckoHistoryResponseSchema>;

export const CoinGeckoCoinIdsSchema = z.record(z.string().min(1), z.string().min(1));
