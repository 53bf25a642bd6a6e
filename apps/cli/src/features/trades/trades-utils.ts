import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const DumpAddressSchema = z.object({ address: z.string().trim().min(1) });

/**
 * The wallet to analyse: --address when given, else the address the dump was taken for.
 */
export function resolveSubjectAddress(address: string | undefined, dump: unknown): Result<string, Error> {
  if (address) {
    return ok(address);
  }
  const parsed = DumpAddressSchema.safeParse(dump);
  if (!parsed.success) {
    return err(new Error('Dump has no address; pass --address'));
  }
  return ok(parsed.data.address);
}
