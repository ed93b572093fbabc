import { describe, expect, it, vi } from 'vitest';
import { InMemoryStore } from '../storage/memory-store.js';
import { BackoffRequestExecutor } from '../sync/backoff-executor.js';
import { SyncOrchestrator, type SyncOrchestratorOptions } from '../sync/sync-orchestrator.js';
import { DataType, type Watermark } from '../types/index.js';
import { BASE_TIME, ScriptedSender, createMockLogger, descending, ledgerPage, tradesPage } from './fakes.js';

const RUN_TIME_MS = 1700050000123;

function setup(sender: ScriptedSender, options: Partial<SyncOrchestratorOptions> = {}) {
  const logger = createMockLogger();
  const backoffSleep = vi.fn(async (_ms: number) => {});
  const throttleSleep = vi.fn(async (_ms: number) => {});
  const executor = new BackoffRequestExecutor(sender, { sleep: backoffSleep, logger });
  const orchestrator = new SyncOrchestrator({
    executor,
    logger,
    sleep: throttleSleep,
    pageSize: 50,
    throttleMs: 2500,
    clock: () => RUN_TIME_MS,
    ...options
  });
  return { orchestrator, logger, backoffSleep, throttleSleep };
}

function tradeWatermark(lastTradeId: string, end: number): Watermark {
  return {
    data_type: DataType.Trades,
    timestamp: BASE_TIME,
    record_timestamp_start: BASE_TIME,
    record_timestamp_end: end,
    last_trade_id: lastTradeId
  };
}

describe('SyncOrchestrator', () => {
  describe('first run', () => {
    it('pages through the whole history until an empty batch', async () => {
      const sender = new ScriptedSender(
        tradesPage(descending(100, 51)),
        tradesPage(descending(50, 1)),
        tradesPage([])
      );
      const { orchestrator, throttleSleep, logger } = setup(sender);

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(100);
      expect(result.stopReason).toBe('empty_batch');
      expect(result.batches).toBe(3);
      expect(result.metadata).toEqual({
        data_type: DataType.Trades,
        timestamp: 1700050000,
        record_timestamp_start: BASE_TIME + 1,
        record_timestamp_end: BASE_TIME + 100,
        last_trade_id: 'TX100'
      });
      expect(sender.requests.map(request => request.payload)).toEqual([{ ofs: 0 }, { ofs: 50 }, { ofs: 100 }]);
      expect(sender.requests[0].endpoint).toBe('/0/private/TradesHistory');
      expect(sender.requests[0].method).toBe('POST');
      expect(throttleSleep.mock.calls).toEqual([[2500], [2500]]);
      expect(logger.info).toHaveBeenCalledWith('sync_trades', 'full_history_retrieval', { data_type: DataType.Trades });
    });

    it('stops once the offset reaches the count reported by the first page', async () => {
      const sender = new ScriptedSender(
        tradesPage(descending(60, 11), 60),
        tradesPage(descending(10, 1), 60)
      );
      const { orchestrator } = setup(sender);

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(60);
      expect(result.stopReason).toBe('offset_exhausted');
      expect(sender.requests).toHaveLength(2);
    });

    it('returns no watermark when nothing comes back', async () => {
      const { orchestrator, throttleSleep } = setup(new ScriptedSender(tradesPage([])));

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(0);
      expect(result.metadata).toBeNull();
      expect(result.stopReason).toBe('empty_batch');
      expect(throttleSleep).not.toHaveBeenCalled();
    });
  });

  describe('resuming', () => {
    it('keeps only the records newer than the stored trade id', async () => {
      const store = new InMemoryStore();
      await store.insertWatermark(tradeWatermark('TX142', BASE_TIME + 142));
      // Full page with more reported behind it: only the stored id can end the run
      const sender = new ScriptedSender(tradesPage(descending(148, 99), 500));
      const { orchestrator, logger } = setup(sender, { metadataStore: store });

      const result = await orchestrator.syncTrades();

      expect([...result.records.keys()]).toEqual(['TX148', 'TX147', 'TX146', 'TX145', 'TX144', 'TX143']);
      expect(result.stopReason).toBe('watermark_reached');
      expect(result.batches).toBe(1);
      expect(sender.requests).toHaveLength(1);
      expect(result.metadata?.last_trade_id).toBe('TX148');
      expect(result.metadata?.record_timestamp_start).toBe(BASE_TIME + 143);
      expect(result.metadata?.record_timestamp_end).toBe(BASE_TIME + 148);
      expect(logger.info).toHaveBeenCalledWith('sync_trades', 'resuming', {
        data_type: DataType.Trades,
        details: { stop_id: 'TX142', record_timestamp_end: BASE_TIME + 142 }
      });
    });

    it('finds the stored id on a later page', async () => {
      const store = new InMemoryStore();
      await store.insertWatermark(tradeWatermark('TX5', BASE_TIME + 5));
      const sender = new ScriptedSender(tradesPage(descending(60, 11)), tradesPage(descending(10, 1)));
      const { orchestrator } = setup(sender, { metadataStore: store });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(55);
      expect(result.records.has('TX6')).toBe(true);
      expect(result.records.has('TX5')).toBe(false);
      expect(result.stopReason).toBe('watermark_reached');
    });

    it('returns no watermark when the newest record is already stored', async () => {
      const store = new InMemoryStore();
      await store.insertWatermark(tradeWatermark('TX9', BASE_TIME + 9));
      const { orchestrator } = setup(new ScriptedSender(tradesPage(descending(9, 1))), { metadataStore: store });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(0);
      expect(result.metadata).toBeNull();
      expect(result.stopReason).toBe('watermark_reached');
    });

    it('falls back to a full retrieval when the watermark cannot be read', async () => {
      const metadataStore = {
        getLatestWatermark: vi.fn(async (): Promise<Watermark | null> => {
          throw new Error('connection refused');
        }),
        insertWatermark: vi.fn(async () => {})
      };
      const { orchestrator, logger } = setup(new ScriptedSender(tradesPage([3, 2, 1])), { metadataStore });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(3);
      expect(logger.warn).toHaveBeenCalledWith('sync_trades', 'watermark_read_failed', {
        data_type: DataType.Trades,
        details: { error: 'connection refused' }
      });
    });
  });

  describe('batch handling', () => {
    it('keeps the first copy of a record repeated across pages', async () => {
      const overlapping = {
        error: [],
        result: {
          trades: {
            TX6: { ordertxid: 'OTHER', pair: 'XXBTZUSD', time: BASE_TIME + 6 },
            TX5: { ordertxid: 'O5', pair: 'XXBTZUSD', time: BASE_TIME + 5 }
          }
        }
      };
      const sender = new ScriptedSender(tradesPage(descending(10, 6)), overlapping, tradesPage([]));
      const { orchestrator } = setup(sender, { pageSize: 5 });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(6);
      expect(result.records.get('TX6')?.ordertxid).toBe('O6');
      expect([...result.records.keys()].slice(4, 6)).toEqual(['TX6', 'TX5']);
    });

    it('keeps records whose time is missing or unusable, leaving them out of the range', async () => {
      const page = {
        error: [],
        result: {
          trades: {
            TX5: { ordertxid: 'O5', time: BASE_TIME + 5.5 },
            TX4: { ordertxid: 'O4', time: null },
            TX3: { ordertxid: 'O3', time: { seconds: 3 } },
            TX2: { ordertxid: 'O2', time: 'n/a' },
            TX1: { ordertxid: 'O1' },
            TX0: { ordertxid: 'O0', time: String(BASE_TIME + 0.75) }
          },
          count: 6
        }
      };
      const { orchestrator } = setup(new ScriptedSender(page));

      const result = await orchestrator.syncTrades();

      expect(result.stopReason).toBe('offset_exhausted');
      expect([...result.records.keys()]).toEqual(['TX5', 'TX4', 'TX3', 'TX2', 'TX1', 'TX0']);
      expect(result.records.get('TX4')).toEqual({ ordertxid: 'O4', time: null });
      expect(result.metadata).toEqual({
        data_type: DataType.Trades,
        timestamp: 1700050000,
        record_timestamp_start: BASE_TIME,
        record_timestamp_end: BASE_TIME + 5,
        last_trade_id: 'TX5'
      });
    });

    it('stops when a batch adds nothing new', async () => {
      const sender = new ScriptedSender(tradesPage(descending(5, 1)), tradesPage(descending(5, 1)));
      const { orchestrator } = setup(sender, { pageSize: 5 });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(5);
      expect(result.stopReason).toBe('no_new_records');
      expect(result.batches).toBe(2);
    });

    it('keeps what was gathered when a later response is malformed', async () => {
      const sender = new ScriptedSender(
        tradesPage(descending(10, 6)),
        { error: [], result: { unexpected: true } }
      );
      const { orchestrator, logger } = setup(sender, { pageSize: 5 });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(5);
      expect(result.stopReason).toBe('malformed_response');
      expect(result.metadata?.last_trade_id).toBe('TX10');
      expect(logger.warn).toHaveBeenCalledWith('sync_trades', 'malformed_response', {
        data_type: DataType.Trades,
        details: { message: 'Malformed or missing response, stopping', batches: 2, records: 5 }
      });
    });

    it('treats a non rate-limit API error as the end of data', async () => {
      const sender = new ScriptedSender(tradesPage(descending(10, 6)), { error: ['EGeneral:Internal error'] });
      const { orchestrator, backoffSleep } = setup(sender, { pageSize: 5 });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(5);
      expect(result.stopReason).toBe('malformed_response');
      expect(backoffSleep).not.toHaveBeenCalled();
    });

    it('retries a rate-limited page with backoff before continuing', async () => {
      const rateLimited = { error: ['EAPI:Rate limit exceeded'] };
      const sender = new ScriptedSender(rateLimited, rateLimited, tradesPage([2, 1]), tradesPage([]));
      const { orchestrator, backoffSleep } = setup(sender);

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(2);
      expect(backoffSleep.mock.calls).toEqual([[2000], [4000]]);
      expect(sender.requests.map(request => request.payload)).toEqual([{ ofs: 0 }, { ofs: 0 }, { ofs: 0 }, { ofs: 50 }]);
    });

    it('ends with whatever was fetched when retries run out', async () => {
      const rateLimited = { error: ['EAPI:Rate limit exceeded'] };
      const sender = new ScriptedSender(
        tradesPage(descending(10, 6)),
        rateLimited, rateLimited, rateLimited, rateLimited, rateLimited
      );
      const { orchestrator, backoffSleep } = setup(sender, { pageSize: 5 });

      const result = await orchestrator.syncTrades();

      expect(result.records.size).toBe(5);
      expect(result.stopReason).toBe('malformed_response');
      expect(backoffSleep).toHaveBeenCalledTimes(5);
    });
  });

  describe('staking rewards', () => {
    it('filters the ledger to staking entries', async () => {
      const sender = new ScriptedSender(ledgerPage([3, 2, 1], 3));
      const { orchestrator } = setup(sender);

      const result = await orchestrator.syncRewards();

      expect(sender.requests).toEqual([
        { method: 'POST', endpoint: '/0/private/Ledgers', payload: { asset: 'all', type: 'staking', ofs: 0 } }
      ]);
      expect(result.stopReason).toBe('offset_exhausted');
      expect(result.metadata).toEqual({
        data_type: DataType.Rewards,
        timestamp: 1700050000,
        record_timestamp_start: BASE_TIME + 1,
        record_timestamp_end: BASE_TIME + 3,
        last_reward_id: 'L3'
      });
    });

    it('pages backwards by time when configured to', async () => {
      const sender = new ScriptedSender(ledgerPage([4, 3]), ledgerPage([2]));
      const { orchestrator } = setup(sender, { pageSize: 2, pagination: { [DataType.Rewards]: 'timestamp' } });

      const result = await orchestrator.syncRewards();

      expect(sender.requests.map(request => request.payload)).toEqual([
        { asset: 'all', type: 'staking' },
        { asset: 'all', type: 'staking', end: BASE_TIME + 2 }
      ]);
      expect(result.records.size).toBe(3);
      expect(result.stopReason).toBe('final_batch');
    });

    it('resumes from the stored reward id, not the trade id', async () => {
      const store = new InMemoryStore();
      await store.insertWatermark(tradeWatermark('L2', BASE_TIME + 2));
      await store.insertWatermark({
        data_type: DataType.Rewards,
        timestamp: BASE_TIME,
        record_timestamp_start: BASE_TIME + 1,
        record_timestamp_end: BASE_TIME + 3,
        last_reward_id: 'L3'
      });
      const { orchestrator } = setup(new ScriptedSender(ledgerPage([5, 4, 3, 2])), { metadataStore: store });

      const result = await orchestrator.syncRewards();

      expect([...result.records.keys()]).toEqual(['L5', 'L4']);
      expect(result.metadata?.last_reward_id).toBe('L5');
    });
  });

  describe('cancellation', () => {
    it('does not fetch once aborted', async () => {
      const sender = new ScriptedSender(tradesPage([1]));
      const { orchestrator } = setup(sender);
      const controller = new AbortController();
      controller.abort();

      const result = await orchestrator.syncTrades(controller.signal);

      expect(sender.requests).toHaveLength(0);
      expect(result.stopReason).toBe('aborted');
      expect(result.metadata).toBeNull();
    });

    it('stops between batches, keeping the records fetched so far but no watermark', async () => {
      const controller = new AbortController();
      const sender = new ScriptedSender(tradesPage(descending(10, 6)), tradesPage(descending(5, 1)));
      const { orchestrator } = setup(sender, {
        pageSize: 5,
        sleep: async () => {
          controller.abort();
        }
      });

      const result = await orchestrator.syncTrades(controller.signal);

      expect(sender.requests).toHaveLength(1);
      expect(result.records.size).toBe(5);
      expect(result.stopReason).toBe('aborted');
      expect(result.metadata).toBeNull();
    });
  });
});
