/**
 * Zod schemas for CryptoCompare API responses
 */

import { z } from 'zod';

/**
 * One hourly OHLCV row from /data/v2/histohour
 */
export const CryptoCompareOHLCVSchema = z.object({
  time: z.number(),
  open: z.number(),
  high: z.number().optional(),
  low: z.number().optional(),
  close: z.number().optional(),
  volumefrom: z.number().optional(),
  volumeto: z.number().optional(),
});

export type CryptoCompareOHLCV = z.infer<typeof CryptoCompareOHLCVSchema>;

/**
 * Error responses carry `Data: {}`, so the inner array is optional
 */
export const CryptoCompareHistoHourResponseSchema = z.object({
  Response: z.string(),
  Message: z.string().optional(),
  HasWarning: z.boolean().optional(),
  Type: z.number().optional(),
  Data: z
    .object({
      Aggregated: z.boolean().optional(),
      TimeFrom: z.number().optional(),
      TimeTo: z.number().optional(),
      Data: z.array(CryptoCompareOHLCVSchema).optional(),
    })
    .optional(),
});

export type CryptoCompareHistoHourResponse = z.infer<typeof CryptoCompareHistoHourResponseSchema>;

export const CryptoCompareErrorResponseSchema = z.object({
  Response: z.literal('Error'),
  Message: z.string(),
});
