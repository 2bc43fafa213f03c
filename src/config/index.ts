import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { BetKind } from '../games/roulette/types.js';

const positiveInt = z.number().int().positive();

const multipliersSchema = z
  .object({
    straight: positiveInt,
    split: positiveInt,
    street: positiveInt,
    basket: positiveInt,
    topline: positiveInt,
    corner: positiveInt,
    doubleLine: positiveInt,
    dozens: positiveInt,
    columns: positiveInt,
    evenOdd: positiveInt,
    highLow: positiveInt,
    redBlack: positiveInt,
  } satisfies Record<BetKind, typeof positiveInt>)
  .partial()
  .strict();

const tableSchema = z
  .object({
    min_bet: positiveInt.default(1),
    max_bet: positiveInt.nullable().default(null), // null: no ceiling
    min_bet_multipliers: multipliersSchema.default({}),
  })
  .strict()
  .refine((t) => t.max_bet === null || t.max_bet >= t.min_bet, {
    message: 'max_bet must not be below min_bet',
  });

export type TableConfig = z.infer<typeof tableSchema>;

const FILE = path.resolve(process.cwd(), 'config', 'table.json');
const cache = new Map<string, TableConfig>();

// For testing: reset the cache
export function resetTableConfigCache() {
  cache.clear();
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) throw new Error(`${name} must be an integer, got "${raw}"`);
  return n;
}

/**
 * Parses a table config object, applying ROULETTE_MIN_BET / ROULETTE_MAX_BET
 * over whatever the file says.
 */
export function parseTableConfig(input: unknown): TableConfig {
  const base = typeof input === 'object' && input !== null ? { ...input } : {};
  const minBet = envInt('ROULETTE_MIN_BET');
  const maxBet = envInt('ROULETTE_MAX_BET');
  const merged = {
    ...base,
    ...(minBet !== undefined ? { min_bet: minBet } : {}),
    ...(maxBet !== undefined ? { max_bet: maxBet } : {}),
  };
  const res = tableSchema.safeParse(merged);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid table config: ${issues}`);
  }
  return res.data;
}

export function loadTableConfig(file: string = FILE): TableConfig {
  const key = path.resolve(file);
  const hit = cache.get(key);
  if (hit) return hit;
  const raw: unknown = fs.existsSync(key) ? JSON.parse(fs.readFileSync(key, 'utf8')) : {};
  const cfg = parseTableConfig(raw);
  cache.set(key, cfg);
  return cfg;
}
