/**
 * Execution Engine Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Replay ordering, per-tick history, error logging and strategy isolation.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigError } from '../src/core/errors';
import { ExecutionEngine } from '../src/engine';
import { maxDrawdown } from '../src/metrics';
import { createStrategy } from '../src/strategies';
import { createObservation } from '../src/types/market';
import { createSequenceRandom } from '../src/utils/random';
import { day, holdOnly, observations, ScriptedStrategy } from './helpers/fixtures';

describe('ExecutionEngine', () => {
    describe('construction', () => {
        test('derives the distinct symbol set in replay order', () => {
            const ticks = [
                createObservation(day(2), 'MSFT', 300),
                createObservation(day(0), 'AAPL', 150),
                createObservation(day(1), 'MSFT', 301),
            ];
            const engine = new ExecutionEngine(ticks, [holdOnly('hold')], 1_000, { seed: 1 });

            expect(engine.symbols).toEqual(['AAPL', 'MSFT']);
        });

        test('rejects duplicate strategy names', () => {
            expect(() => new ExecutionEngine(observations('X', [1]), [holdOnly('a'), holdOnly('a')], 1_000, { seed: 1 }))
                .toThrow(ConfigError);
        });

        test('rejects non-positive initial cash', () => {
            expect(() => new ExecutionEngine(observations('X', [1]), [holdOnly('a')], 0, { seed: 1 }))
                .toThrow('Initial cash must be a positive number, got 0');
        });

        test('rejects a failure probability outside [0, 1]', () => {
            expect(() => new ExecutionEngine(observations('X', [1]), [holdOnly('a')], 1_000, {
                seed: 1,
                failureProbability: 1.5,
            })).toThrow('failureProbability must be within [0, 1], got 1.5');
        });

        test('rejects observations with non-positive prices', () => {
            expect(() => new ExecutionEngine(observations('X', [10, -1]), [holdOnly('a')], 1_000, { seed: 1 }))
                .toThrow('Observation 1 (X) has non-positive price -1');
        });

        test('defaults come from constants, not the environment', () => {
            const saved = process.env.BACKTEST_PERIODS_PER_YEAR;
            process.env.BACKTEST_PERIODS_PER_YEAR = 'abc';
            try {
                const engine = new ExecutionEngine(observations('X', [1]), [holdOnly('a')], 10);
                expect(engine.failureProbability).toBe(0.01);
            } finally {
                if (saved === undefined) delete process.env.BACKTEST_PERIODS_PER_YEAR;
                else process.env.BACKTEST_PERIODS_PER_YEAR = saved;
            }
        });

        test('allowShort is accepted but sells stay capped at held quantity', () => {
            const seller = new ScriptedStrategy('seller', obs => ['Sell', obs.symbol, 5, obs.price]);
            const engine = new ExecutionEngine(observations('X', [10]), [seller], 1_000, {
                allowShort: true,
                failureProbability: 0,
                seed: 1,
            });

            const state = engine.run().get('seller');

            expect(engine.allowShort).toBe(true);
            expect(state?.validationErrors).toHaveLength(1);
            expect(state?.portfolio.getPosition('X').quantity).toBe(0);
        });
    });

    describe('run', () => {
        test('hold-only strategy: no orders, one sample per tick, flat at initial cash', () => {
            const ticks = observations('AAPL', [150, 151, 149, 155, 160]);
            const results = new ExecutionEngine(ticks, [holdOnly('hold')], 50_000, { seed: 3 }).run();
            const state = results.get('hold');

            expect(state?.orders).toHaveLength(0);
            expect(state?.history).toHaveLength(5);
            expect(state?.history.map(s => s.value)).toEqual([50_000, 50_000, 50_000, 50_000, 50_000]);
            expect(state?.history.map(s => s.timestamp)).toEqual([day(0), day(1), day(2), day(3), day(4)]);
        });

        test('successful buy of 100 @ 150 from 1,000,000', () => {
            const buyOnce = new ScriptedStrategy('buyer', (obs, call) =>
                call === 0 ? ['Buy', obs.symbol, 100, obs.price] : ['Hold', obs.symbol, 0, obs.price]
            );
            const results = new ExecutionEngine(observations('AAPL', [150.0, 160.0]), [buyOnce], 1_000_000, {
                failureProbability: 0,
                seed: 1,
            }).run();
            const state = results.get('buyer');

            expect(state?.portfolio.cash).toBe(985_000);
            expect(state?.portfolio.getPosition('AAPL')).toEqual({ symbol: 'AAPL', quantity: 100, averagePrice: 150 });
            expect(state?.orders.map(o => o.status)).toEqual(['success']);
            // 985000 + 100 * 150, then 985000 + 100 * 160
            expect(state?.history.map(s => s.value)).toEqual([1_000_000, 1_001_000]);
        });

        test('failed sell validation logs once and leaves the portfolio untouched', () => {
            const seller = new ScriptedStrategy('seller', (obs, call) =>
                call === 1 ? ['Sell', obs.symbol, 10, obs.price] : ['Hold', obs.symbol, 0, obs.price]
            );
            const results = new ExecutionEngine(observations('AAPL', [100, 101, 102]), [seller], 5_000, {
                failureProbability: 0,
                seed: 1,
            }).run();
            const state = results.get('seller');

            expect(state?.validationErrors).toEqual([
                { timestamp: day(1), message: 'Not enough shares to sell AAPL: attempted 10, held 0' },
            ]);
            expect(state?.orders).toHaveLength(0);
            expect(state?.portfolio.cash).toBe(5_000);
            expect(state?.history).toHaveLength(3);
        });

        test('execution failure marks the order failed, keeps it, and logs it', () => {
            const buyer = new ScriptedStrategy('buyer', obs => ['Buy', obs.symbol, 1, obs.price]);
            const results = new ExecutionEngine(observations('XYZ', [100, 100]), [buyer], 1_000, {
                failureProbability: 0.5,
                random: createSequenceRandom([0.1, 0.9]),
            }).run();
            const state = results.get('buyer');

            expect(state?.orders.map(o => o.status)).toEqual(['failed', 'success']);
            expect(state?.executionErrors).toEqual([
                { timestamp: day(0), message: 'Market rejected order: Order(BUY 1 XYZ @ 100)' },
            ]);
            expect(state?.portfolio.getPosition('XYZ').quantity).toBe(1);
            expect(state?.history.map(s => s.value)).toEqual([1_000, 1_000]);
        });

        test('history is recorded even on ticks where execution failed', () => {
            const buyer = new ScriptedStrategy('buyer', obs => ['Buy', obs.symbol, 1, obs.price]);
            const results = new ExecutionEngine(observations('XYZ', [10, 11, 12]), [buyer], 100, {
                failureProbability: 1,
                seed: 9,
            }).run();
            const state = results.get('buyer');

            expect(state?.history).toHaveLength(3);
            expect(state?.orders.every(o => o.status === 'failed')).toBe(true);
            expect(state?.executionErrors).toHaveLength(3);
        });

        test('strategies see every observation once, in timestamp order, ties in input order', () => {
            const watcher = holdOnly('watcher');
            const ticks = [
                createObservation(day(1), 'B', 20),
                createObservation(day(0), 'A', 10),
                createObservation(day(1), 'A', 11),
                createObservation(day(0), 'B', 21),
            ];

            new ExecutionEngine(ticks, [watcher], 1_000, { seed: 1 }).run();

            expect(watcher.seen.map(o => `${o.symbol}@${o.price}`)).toEqual(['A@10', 'B@21', 'B@20', 'A@11']);
        });

        test('out-of-order input replays identically to its sorted form', () => {
            const prices = [10, 11, 12, 11, 10, 9, 10, 12, 13, 12];
            const sorted = observations('AAPL', prices);
            const shuffled = [...sorted].reverse();

            const runWith = (input: typeof sorted) => {
                const strategy = createStrategy({ kind: 'ma_crossover', params: { shortWindow: 2, longWindow: 3, quantity: 5 } });
                const results = new ExecutionEngine(input, [strategy], 1_000, { failureProbability: 0.3, seed: 11 }).run();
                const state = results.get(strategy.name);
                return {
                    history: state?.history,
                    orders: state?.orders.map(o => [o.symbol, o.quantity, o.price, o.status]),
                    validationErrors: state?.validationErrors,
                    executionErrors: state?.executionErrors,
                };
            };

            expect(runWith(shuffled)).toEqual(runWith(sorted));
        });

        test('a forced execution failure for one strategy leaves the other untouched', () => {
            const ticks = observations('XYZ', [100, 100, 110]);
            const script = (name: string) => new ScriptedStrategy(name, (obs, call) =>
                call === 1 ? ['Buy', obs.symbol, 10, obs.price] : ['Hold', obs.symbol, 0, obs.price]
            );

            // tick 1: A draws 0.0 (fails), B draws 0.9 (fills)
            const both = new ExecutionEngine(ticks, [script('A'), script('B')], 1_000, {
                failureProbability: 0.5,
                random: createSequenceRandom([0.0, 0.9]),
            }).run();
            const alone = new ExecutionEngine(ticks, [script('B')], 1_000, {
                failureProbability: 0.5,
                random: createSequenceRandom([0.9]),
            }).run();

            const a = both.get('A');
            const b = both.get('B');

            expect(a?.orders.map(o => o.status)).toEqual(['failed']);
            expect(a?.executionErrors).toHaveLength(1);
            expect(a?.history.map(s => s.value)).toEqual([1_000, 1_000, 1_000]);

            expect(b?.orders.map(o => o.status)).toEqual(['success']);
            expect(b?.executionErrors).toHaveLength(0);
            expect(b?.history.map(s => s.value)).toEqual([1_000, 1_000, 1_100]);
            expect(b?.history).toEqual(alone.get('B')?.history);
        });

        test('drawdown recovery falls on a later tick than the bottom when symbols share timestamps', () => {
            const ticks = [
                [100, 100], [100, 100], [50, 200], [100, 200],
            ].flatMap(([a, b], i) => [
                createObservation(day(i), 'A', a),
                createObservation(day(i), 'B', b),
            ]);
            const buyer = new ScriptedStrategy('pair', (obs, call) =>
                call < 2 ? ['Buy', obs.symbol, 5, obs.price] : ['Hold', obs.symbol, 0, obs.price]
            );
            const state = new ExecutionEngine(ticks, [buyer], 1_000, { failureProbability: 0, seed: 1 })
                .run()
                .get('pair');

            expect(state?.history.map(s => s.value)).toEqual([1000, 1000, 1000, 1000, 750, 1250, 1500, 1500]);

            const report = maxDrawdown(state?.history ?? []);
            expect(report?.maxDrawdown).toBe(-0.25);
            expect(report?.peakTime).toEqual(day(1));
            expect(report?.bottomTime).toEqual(day(2));
            expect(report?.recoveryTime).toEqual(day(3));
        });

        test('results are keyed by strategy name in registration order', () => {
            const results = new ExecutionEngine(observations('X', [1, 2]), [holdOnly('zeta'), holdOnly('alpha')], 10, {
                seed: 1,
            }).run();

            expect([...results.keys()]).toEqual(['zeta', 'alpha']);
        });

        test('run is single-shot', () => {
            const engine = new ExecutionEngine(observations('X', [1]), [holdOnly('a')], 10, { seed: 1 });
            engine.run();
            expect(() => engine.run()).toThrow('run() may only be called once per engine');
        });

        test('errors outside the order taxonomy propagate', () => {
            const broken = new ScriptedStrategy('broken', () => {
                throw new TypeError('indicator blew up');
            });
            const engine = new ExecutionEngine(observations('X', [1]), [broken], 10, { seed: 1 });

            expect(() => engine.run()).toThrow('indicator blew up');
        });
    });
});
