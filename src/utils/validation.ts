/**
 * Validation of upstream payloads using Zod
 * Records are kept loose (passthrough): only the fields the engine reads are checked
 */

import { z } from 'zod';
import type { KrakenResponse, RewardEntry, TradeRecord } from '../types/index.js';

// Not checked here: normalizeTimestamp decides whether a time is usable
const TimeSchema = z.unknown();

export const KrakenEnvelopeSchema = z.object({
  error: z.array(z.string()).default([]),
  result: z.unknown().optional()
});

export const TradeRecordSchema = z.object({
  time: TimeSchema,
  pair: z.string().optional(),
  ordertxid: z.string().optional()
}).passthrough();

export const RewardEntrySchema = z.object({
  time: TimeSchema,
  asset: z.string().optional(),
  refid: z.string().optional()
}).passthrough();

const CountSchema = z.union([z.number(), z.string().regex(/^\d+$/)])
  .transform(val => Number(val))
  .optional();

export const TradesResultSchema = z.object({
  trades: z.record(TradeRecordSchema),
  count: CountSchema
});

export const LedgerResultSchema = z.object({
  ledger: z.record(RewardEntrySchema),
  count: CountSchema
});

export interface ParsedResult<T> {
  records: Array<[string, T]>;
  count: number | null;
}

export class ValidationUtils {
  /**
   * Validate the `{ error, result }` envelope every Kraken response shares
   */
  static parseEnvelope(payload: unknown): KrakenResponse | null {
    const parsed = KrakenEnvelopeSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  static parseTradesResult(result: unknown): ParsedResult<TradeRecord> | null {
    const parsed = TradesResultSchema.safeParse(result);
    if (!parsed.success) {
      return null;
    }
    return { records: Object.entries(parsed.data.trades), count: parsed.data.count ?? null };
  }

  static parseLedgerResult(result: unknown): ParsedResult<RewardEntry> | null {
    const parsed = LedgerResultSchema.safeParse(result);
    if (!parsed.success) {
      return null;
    }
    return { records: Object.entries(parsed.data.ledger), count: parsed.data.count ?? null };
  }

  /**
   * Case-insensitive scan of an error list for the rate-limit marker
   */
  static isRateLimited(errors: string[], marker: string): boolean {
    const needle = marker.toLowerCase();
    return errors.some(message => message.toLowerCase().includes(needle));
  }
}
