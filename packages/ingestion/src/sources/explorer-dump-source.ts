import type { RawTransfer, TransactionContext } from '@swaptrace/core';
import { MalformedInputError } from '@swaptrace/core';
import { getLogger, type Logger } from '@swaptrace/logger';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import { normalizeAddress, type ChainConfig } from '../registry/chain-registry.js';

import { ExplorerDumpEnvelopeSchema, type ExplorerDumpEnvelope } from './dump-schemas.js';

/**
 * Transactions and transfers for one wallet on one chain
 */
export interface ChainTransactionSource {
  readonly chain: string;
  fetchTransactions(address: string): Promise<Result<TransactionContext[], Error>>;
  fetchTransfers(address: string): Promise<Result<RawTransfer[], Error>>;
}

/**
 * Produces the raw dump document (parsed JSON) on demand
 */
export type DumpLoader = () => Promise<Result<unknown, Error>>;

/**
 * Receives metadata for tokens discovered in a dump
 */
export interface TokenRegistrar {
  register(chain: string, assetId: string, info: { decimals?: number | undefined; symbol: string }): boolean;
}

export interface ExplorerDumpSourceOptions {
  tokenRegistrar?: TokenRegistrar | undefined;
  /** Called for every skipped row, after it is logged */
  onMalformedInput?: ((error: MalformedInputError) => void) | undefined;
}

export interface NormalizedDump {
  transactions: TransactionContext[];
  transfers: RawTransfer[];
}

/**
 * Base for sources reading a saved explorer dump.
 *
 * The dump is loaded and normalized once per address; both fetch methods share
 * the result. Subclasses map the family-specific rows.
 */
export abstract class ExplorerDumpSource implements ChainTransactionSource {
  protected readonly logger: Logger;
  protected readonly tokenRegistrar: TokenRegistrar | undefined;
  private readonly onMalformedInput: ((error: MalformedInputError) => void) | undefined;
  private readonly normalized = new Map<string, Promise<Result<NormalizedDump, Error>>>();

  constructor(
    protected readonly config: ChainConfig,
    private readonly loadDump: DumpLoader,
    options: ExplorerDumpSourceOptions = {}
  ) {
    this.logger = getLogger(`${this.constructor.name}:${config.name}`);
    this.tokenRegistrar = options.tokenRegistrar;
    this.onMalformedInput = options.onMalformedInput;
  }

  get chain(): string {
    return this.config.name;
  }

  async fetchTransactions(address: string): Promise<Result<TransactionContext[], Error>> {
    const result = await this.load(address);
    return result.map((dump) => dump.transactions);
  }

  async fetchTransfers(address: string): Promise<Result<RawTransfer[], Error>> {
    const result = await this.load(address);
    return result.map((dump) => dump.transfers);
  }

  /**
   * Map the validated envelope into contexts and transfers. Every transfer must
   * reference a context in the returned batch.
   */
  protected abstract normalize(envelope: ExplorerDumpEnvelope): NormalizedDump;

  /**
   * Validate one row; malformed rows are logged, reported and skipped
   */
  protected parseRow<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    row: unknown,
    section: keyof ExplorerDumpEnvelope,
    index: number,
    record: 'transaction' | 'transfer'
  ): T | undefined {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      return parsed.data;
    }

    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    this.reportMalformed(
      new MalformedInputError(`Invalid ${section} row ${index}: ${issues}`, record, {
        additionalContext: { chain: this.config.name, index, section },
      })
    );
    return undefined;
  }

  protected reportMalformed(error: MalformedInputError): void {
    this.logger.warn({ error }, `Skipping malformed ${error.record}: ${error.message}`);
    this.onMalformedInput?.(error);
  }

  private load(address: string): Promise<Result<NormalizedDump, Error>> {
    const subject = normalizeAddress(this.config.family, address);
    let pending = this.normalized.get(subject);
    if (!pending) {
      pending = this.loadAndNormalize(subject);
      this.normalized.set(subject, pending);
    }
    return pending;
  }

  private async loadAndNormalize(subject: string): Promise<Result<NormalizedDump, Error>> {
    const rawResult = await this.loadDump();
    if (rawResult.isErr()) {
      return err(rawResult.error);
    }

    const envelope = ExplorerDumpEnvelopeSchema.safeParse(rawResult.value);
    if (!envelope.success) {
      const issues = envelope.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new Error(`Invalid ${this.config.name} explorer dump: ${issues}`));
    }

    const dumpAddress = normalizeAddress(this.config.family, envelope.data.address);
    if (dumpAddress !== subject) {
      return err(new Error(`Explorer dump is for ${envelope.data.address}, not ${subject}`));
    }

    const dump = this.normalize(envelope.data);
    this.logger.info(
      `Loaded ${dump.transactions.length} transactions and ${dump.transfers.length} transfers for ${subject}`
    );
    return ok(dump);
  }
}
