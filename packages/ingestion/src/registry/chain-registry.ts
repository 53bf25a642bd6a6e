import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import chainsData from './chains.json' with { type: 'json' };

export const CHAIN_FAMILIES = ['evm', 'solana', 'sui'] as const;
export type ChainFamily = (typeof CHAIN_FAMILIES)[number];

const SelectorSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{8}$/, 'Selector must be 0x followed by 8 hex characters')
  .transform((selector) => selector.toLowerCase());

const ChainDefinitionSchema = z.object({
  family: z.enum(CHAIN_FAMILIES),
  nativeAsset: z.string().min(1),
  nativeDecimals: z.number().int().nonnegative(),
  nativeSymbol: z.string().min(1),
  routers: z.record(z.string().min(1), z.string().min(1)).default({}),
  swapSelectors: z.array(SelectorSchema).optional(),
  wrappedNative: z
    .object({
      address: z.string().min(1),
      symbol: z.string().min(1),
    })
    .optional(),
});

export const ChainsFileSchema = z.object({
  chains: z.record(z.string().min(1), ChainDefinitionSchema),
  evmSwapSelectors: z.array(SelectorSchema).default([]),
});

export type ChainsFile = z.infer<typeof ChainsFileSchema>;

/**
 * Read-only settings for one chain, with every address already normalized for its family
 */
export interface ChainConfig {
  readonly name: string;
  readonly family: ChainFamily;
  /** Sentinel asset id used for native-currency transfers */
  readonly nativeAsset: string;
  readonly nativeSymbol: string;
  readonly nativeDecimals: number;
  readonly wrappedNative?: { readonly address: string; readonly symbol: string } | undefined;
  /** Router address -> DEX name */
  readonly routers: ReadonlyMap<string, string>;
  readonly swapSelectors: ReadonlySet<string>;
}

/**
 * EVM addresses and Sui coin types are case-insensitive; Solana base58 keys are not.
 */
export function normalizeAddress(family: ChainFamily, address: string): string {
  const trimmed = address.trim();
  return family === 'solana' ? trimmed : trimmed.toLowerCase();
}

/**
 * Registry of supported chains, built from chains.json or an injected definition file.
 *
 * Usage:
 * ```typescript
 * const config = CHAIN_REGISTRY.require('base');
 * if (config.isOk()) detector = new SwapDetector(config.value);
 * ```
 */
export class ChainRegistry {
  private readonly chains: ReadonlyMap<string, ChainConfig>;

  constructor(file: ChainsFile) {
    const chains = new Map<string, ChainConfig>();

    for (const [name, definition] of Object.entries(file.chains)) {
      const family = definition.family;
      const routers = new Map<string, string>();
      for (const [address, dex] of Object.entries(definition.routers)) {
        routers.set(normalizeAddress(family, address), dex);
      }

      const selectors = definition.swapSelectors ?? (family === 'evm' ? file.evmSwapSelectors : []);

      chains.set(name.toLowerCase(), {
        family,
        name: name.toLowerCase(),
        nativeAsset: normalizeAddress(family, definition.nativeAsset),
        nativeDecimals: definition.nativeDecimals,
        nativeSymbol: definition.nativeSymbol,
        routers,
        swapSelectors: new Set(selectors),
        wrappedNative: definition.wrappedNative
          ? {
              address: normalizeAddress(family, definition.wrappedNative.address),
              symbol: definition.wrappedNative.symbol,
            }
          : undefined,
      });
    }

    this.chains = chains;
  }

  /**
   * Validate raw definitions (e.g. a parsed JSON file) and build a registry
   */
  static fromDefinitions(data: unknown): Result<ChainRegistry, Error> {
    const parsed = ChainsFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new Error(`Invalid chain definitions: ${issues}`));
    }
    return ok(new ChainRegistry(parsed.data));
  }

  get(chainName: string): ChainConfig | undefined {
    return this.chains.get(chainName.toLowerCase());
  }

  require(chainName: string): Result<ChainConfig, Error> {
    const config = this.get(chainName);
    if (!config) {
      return err(new Error(`Chain '${chainName}' not supported. Supported chains: ${this.names().join(', ')}`));
    }
    return ok(config);
  }

  has(chainName: string): boolean {
    return this.chains.has(chainName.toLowerCase());
  }

  names(): string[] {
    return Array.from(this.chains.keys());
  }
}

/**
 * Registry of all bundled chains, loaded from chains.json
 */
export const CHAIN_REGISTRY = new ChainRegistry(ChainsFileSchema.parse(chainsData));

export function getChainConfig(chainName: string): ChainConfig | undefined {
  return CHAIN_REGISTRY.get(chainName);
}

export function getAllChainNames(): string[] {
  return CHAIN_REGISTRY.names();
}

export function isChainSupported(chainName: string): boolean {
  return CHAIN_REGISTRY.has(chainName);
}
