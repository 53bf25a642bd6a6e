// C0/C1 controls, zero-width and bidi marks, invisible separators, BOM
const HIDDEN_CHARACTERS = /[\u0000-\u001F\u007F-\u009F\u00AD\u200B-\u200F\u2028-\u202E\u2060-\u206F\uFEFF]/u;

const MAX_TOKEN_DECIMALS = 255;

/**
 * Trimmed symbol, or undefined when it is empty or hides characters a reader cannot see
 * (a common trick for tokens impersonating USDC and friends).
 */
export function sanitizeTokenSymbol(symbol: string | undefined): string | undefined {
  if (symbol === undefined) return undefined;
  const trimmed = symbol.trim();
  if (trimmed === '' || HIDDEN_CHARACTERS.test(trimmed)) {
    return undefined;
  }
  return trimmed;
}

export function isValidTokenDecimals(decimals: number | undefined): decimals is number {
  return decimals !== undefined && Number.isInteger(decimals) && decimals >= 0 && decimals <= MAX_TOKEN_DECIMALS;
}

/**
 * Display symbol from a Sui coin type: `0x...::module::NAME` -> `NAME`
 */
export function symbolFromSuiCoinType(coinType: string): string | undefined {
  const parts = coinType.split('::');
  if (parts.length < 3) return undefined;
  const name = parts[parts.length - 1]?.replace(/>+$/, '');
  return sanitizeTokenSymbol(name?.toUpperCase());
}
