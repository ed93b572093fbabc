/**
 * Asset-pair enrichment
 *
 * Adds `base` and `wsname` to every trade from the exchange's asset-pair
 * metadata, mapping Kraken's legacy asset codes (XXBT, XXDG, ...) to their
 * common tickers. Returns new records; the fetched ones are left as they are.
 */

import ccxt from 'ccxt';
import { z } from 'zod';
import { BASE_TRANSFORM_MAP, WSNAME_TRANSFORM_MAP } from '../constants.js';
import type { EnrichedTradeRecord, TradeRecord } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface AssetPairInfo {
  base?: string;
  wsname?: string;
}

export interface AssetPairCatalog {
  lookup(pair: string): Promise<AssetPairInfo | null>;
}

export type MarketLoader = () => Promise<unknown[]>;

const MarketSchema = z.object({
  id: z.string(),
  info: z.object({
    altname: z.string().optional(),
    base: z.string().optional(),
    wsname: z.string().optional()
  }).passthrough()
});

const loadKrakenMarkets: MarketLoader = async () => {
  const exchange = new ccxt.kraken({ enableRateLimit: true });
  const markets = await exchange.loadMarkets();
  return Object.values(markets);
};

/**
 * Asset-pair metadata from the exchange's public markets, loaded once
 */
export class CcxtAssetPairCatalog implements AssetPairCatalog {
  private pairs: Promise<Map<string, AssetPairInfo>> | null = null;

  constructor(
    private readonly loadMarkets: MarketLoader = loadKrakenMarkets,
    private readonly logger: Logger = silentLogger
  ) {}

  async lookup(pair: string): Promise<AssetPairInfo | null> {
    if (!this.pairs) {
      this.pairs = this.load();
    }
    const pairs = await this.pairs;
    return pairs.get(pair) ?? null;
  }

  private async load(): Promise<Map<string, AssetPairInfo>> {
    const pairs = new Map<string, AssetPairInfo>();
    for (const market of await this.loadMarkets()) {
      const parsed = MarketSchema.safeParse(market);
      if (!parsed.success) {
        continue;
      }
      const { id, info } = parsed.data;
      const entry: AssetPairInfo = { base: info.base, wsname: info.wsname };
      pairs.set(id, entry);
      if (info.altname && !pairs.has(info.altname)) {
        pairs.set(info.altname, entry);
      }
    }

    this.logger.info('enrichment', 'asset_pairs_loaded', { details: { count: pairs.size } });
    return pairs;
  }
}

export function normalizeBase(base: string): string {
  return BASE_TRANSFORM_MAP[base] ?? base;
}

export function normalizeWsname(wsname: string): string {
  return WSNAME_TRANSFORM_MAP[wsname] ?? wsname;
}

export async function enrichTrades(
  trades: ReadonlyMap<string, TradeRecord>,
  catalog: AssetPairCatalog,
  logger: Logger = silentLogger
): Promise<Map<string, EnrichedTradeRecord>> {
  const enriched = new Map<string, EnrichedTradeRecord>();
  const missingPairs = new Set<string>();
  let enrichedCount = 0;

  for (const [id, trade] of trades) {
    const pair = trade.pair;
    if (!pair) {
      logger.warn('enrichment', 'trade_missing_pair', { details: { trade_id: id } });
      enriched.set(id, { ...trade });
      continue;
    }

    const info = await catalog.lookup(pair);
    if (info) {
      enriched.set(id, {
        ...trade,
        base: normalizeBase(info.base ?? pair),
        wsname: normalizeWsname(info.wsname ?? pair)
      });
    } else {
      if (!missingPairs.has(pair)) {
        logger.warn('enrichment', 'asset_pair_not_found', { details: { pair } });
        missingPairs.add(pair);
      }
      enriched.set(id, { ...trade, base: pair, wsname: pair });
    }
    enrichedCount++;
  }

  logger.info('enrichment', 'trades_enriched', { details: { count: enrichedCount } });
  return enriched;
}
