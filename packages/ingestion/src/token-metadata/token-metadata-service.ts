import { getLogger } from '@swaptrace/logger';
import { z } from 'zod';

import { CHAIN_REGISTRY, normalizeAddress, type ChainConfig, type ChainRegistry } from '../registry/chain-registry.js';

import knownTokensData from './known-tokens.json' with { type: 'json' };
import { isValidTokenDecimals, sanitizeTokenSymbol, symbolFromSuiCoinType } from './token-metadata-utils.js';

const logger = getLogger('TokenMetadata');

export interface TokenInfo {
  symbol: string;
  /** Unknown for tokens whose symbol was derived from the asset id alone */
  decimals?: number | undefined;
}

export interface TokenMetadataService {
  getToken(chain: string, assetId: string): TokenInfo | undefined;
}

const KnownTokensSchema = z.record(
  z.string().min(1),
  z.record(z.string().min(1), z.object({ decimals: z.number().int().nonnegative(), symbol: z.string() }))
);

export type KnownTokens = z.infer<typeof KnownTokensSchema>;

export const DEFAULT_KNOWN_TOKENS: KnownTokens = KnownTokensSchema.parse(knownTokensData);

/**
 * Token lookup from static tables: the chain's native and wrapped-native assets,
 * known-tokens.json, and tokens registered at run time (e.g. from an explorer dump).
 *
 * Static entries win over registered ones. A symbol hiding zero-width or control
 * characters is treated as unknown wherever it comes from.
 */
export class StaticTokenMetadataService implements TokenMetadataService {
  private readonly known = new Map<string, Map<string, TokenInfo>>();
  private readonly registered = new Map<string, Map<string, TokenInfo>>();

  constructor(
    private readonly registry: ChainRegistry = CHAIN_REGISTRY,
    knownTokens: KnownTokens = DEFAULT_KNOWN_TOKENS
  ) {
    for (const [chainName, tokens] of Object.entries(knownTokens)) {
      const chain = registry.get(chainName);
      if (!chain) {
        logger.warn(`Ignoring known tokens for unsupported chain ${chainName}`);
        continue;
      }
      const table = this.tableFor(this.known, chain.name);
      for (const [assetId, info] of Object.entries(tokens)) {
        table.set(normalizeAddress(chain.family, assetId), info);
      }
    }
  }

  getToken(chainName: string, assetId: string): TokenInfo | undefined {
    const chain = this.registry.get(chainName);
    if (!chain) return undefined;

    const key = normalizeAddress(chain.family, assetId);
    const candidate = this.findCandidate(chain, key);
    if (!candidate) return undefined;

    const symbol = sanitizeTokenSymbol(candidate.symbol);
    if (!symbol) {
      logger.debug(`Rejected token symbol for ${key} on ${chain.name}`);
      return undefined;
    }

    return { decimals: isValidTokenDecimals(candidate.decimals) ? candidate.decimals : undefined, symbol };
  }

  /**
   * Remember a token seen at run time. Returns false when the entry was rejected.
   */
  register(chainName: string, assetId: string, info: TokenInfo): boolean {
    const chain = this.registry.get(chainName);
    const symbol = sanitizeTokenSymbol(info.symbol);
    if (!chain || !symbol || assetId.trim() === '') {
      return false;
    }

    const table = this.tableFor(this.registered, chain.name);
    const key = normalizeAddress(chain.family, assetId);
    if (!table.has(key)) {
      table.set(key, { decimals: isValidTokenDecimals(info.decimals) ? info.decimals : undefined, symbol });
    }
    return true;
  }

  private findCandidate(chain: ChainConfig, key: string): TokenInfo | undefined {
    if (key === chain.nativeAsset) {
      return { decimals: chain.nativeDecimals, symbol: chain.nativeSymbol };
    }
    if (chain.wrappedNative && key === chain.wrappedNative.address) {
      return { decimals: chain.nativeDecimals, symbol: chain.wrappedNative.symbol };
    }

    const known = this.known.get(chain.name)?.get(key) ?? this.registered.get(chain.name)?.get(key);
    if (known) return known;

    if (chain.family === 'sui') {
      const symbol = symbolFromSuiCoinType(key);
      return symbol ? { symbol } : undefined;
    }
    return undefined;
  }

  private tableFor(tables: Map<string, Map<string, TokenInfo>>, chainName: string): Map<string, TokenInfo> {
    let table = tables.get(chainName);
    if (!table) {
      table = new Map();
      tables.set(chainName, table);
    }
    return table;
  }
}
