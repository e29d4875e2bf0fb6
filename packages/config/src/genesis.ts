import { readFile } from 'node:fs/promises';

import { GenesisSchema, LedgerError, invalidConfig, type Genesis } from '@reflex/shared';

export function parseGenesis(input: unknown): Genesis {
  const parsed = GenesisSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidConfig('invalid_genesis', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
  }
  return parsed.data;
}

/** Reads and validates the genesis JSON file. */
export async function loadGenesis(path: string): Promise<Genesis> {
  const raw = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new LedgerError({ code: 'INVALID_CONFIG', message: 'genesis_not_json', details: { path }, cause: err });
  }
  return parseGenesis(json);
}
