export type PriceDataUnavailableReason = 'rate-limit' | 'upstream-error' | 'unknown-asset' | 'other';

/**
 * A provider could not deliver price data for an asset
 */
export class PriceDataUnavailableError extends Error {
  constructor(
    message: string,
    public readonly assetSymbol: string,
    public readonly provider: string,
    public readonly reason: PriceDataUnavailableReason
  ) {
    super(message);
    this.name = 'PriceDataUnavailableError';
  }
}
