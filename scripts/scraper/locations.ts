import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { logger } from './logger';
import { LocationConfig } from './types';

const locationSchema = z.object({
  key: z.string().min(1),
  displayName: z.string().min(1),
  seedUrl: z.string().url(),
  enabled: z.boolean().default(true),
});

const locationsSchema = z.array(locationSchema);

export function parseLocations(data: unknown): LocationConfig[] {
  const result = locationsSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid locations config: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  const seen = new Set<string>();
  for (const loc of result.data) {
    if (seen.has(loc.key)) throw new ConfigError(`Duplicate location key: ${loc.key}`);
    seen.add(loc.key);
  }
  return result.data.map((loc) => Object.freeze(loc));
}

export async function loadLocations(file: string): Promise<LocationConfig[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read locations file ${file}`, { cause: err });
  }
  try {
    return parseLocations(JSON.parse(raw));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Locations file ${file} is not valid JSON`, { cause: err });
  }
}

/** Enabled locations, narrowed to `keys` when the caller picked some. */
export function selectLocations(all: readonly LocationConfig[], keys: readonly string[] = []): LocationConfig[] {
  if (!keys.length) return all.filter((l) => l.enabled);
  const byKey = new Map(all.map((l) => [l.key, l]));
  const picked: LocationConfig[] = [];
  for (const key of keys) {
    const loc = byKey.get(key);
    if (!loc) {
      logger.warn('Unknown location key, skipping', { key });
    } else if (!loc.enabled) {
      logger.warn('Location is disabled, skipping', { key });
    } else if (!picked.includes(loc)) {
      picked.push(loc);
    }
  }
  return picked;
}
