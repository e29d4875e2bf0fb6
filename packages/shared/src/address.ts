import { LedgerError } from './errors';
import { AddressSchema } from './schemas';

/** Lowercased address, or INVALID_ADDRESS. */
export function parseAddress(value: string): string {
  const parsed = AddressSchema.safeParse(value);
  if (!parsed.success) {
    throw new LedgerError({ code: 'INVALID_ADDRESS', message: 'invalid_address', details: { address: value } });
  }
  return parsed.data;
}
