/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * RUN BACKTEST - ONE-CALL ORCHESTRATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Resolve defaults from config (env → constants)
 * 2. Build strategies from configs (ConfigError propagates, nothing has run)
 * 3. Construct the engine and replay
 * 4. Build the run report
 *
 * No I/O beyond logging. Observations come from the caller.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { LOG_PREFIX } from '../config/constants';
import { loadConfig } from '../config/default';
import { ExecutionEngine, RunResults } from '../engine';
import { buildRunReport, RunReport } from '../metrics';
import { createStrategy, Strategy, StrategyConfig } from '../strategies';
import { MarketObservation } from '../types/market';
import { generateRunId } from '../utils/id';
import logger from '../utils/logger';
import { RandomSource } from '../utils/random';

export interface BacktestRequest {
    observations: readonly MarketObservation[];
    /** Ready strategy instances, or configs for the factory */
    strategies: ReadonlyArray<Strategy | StrategyConfig>;
    initialCash?: number;
    failureProbability?: number;
    seed?: number;
    random?: RandomSource;
    allowShort?: boolean;
    riskFreeRate?: number;
    periodsPerYear?: number;
}

export interface BacktestOutcome {
    runId: string;
    results: RunResults;
    report: RunReport;
}

function isStrategy(entry: Strategy | StrategyConfig): entry is Strategy {
    return 'generateSignals' in entry;
}

export function runBacktest(request: BacktestRequest): BacktestOutcome {
    const config = loadConfig();
    const runId = generateRunId();

    const strategies = request.strategies.map(entry => (isStrategy(entry) ? entry : createStrategy(entry)));

    logger.info(`${LOG_PREFIX.BACKTEST} ${runId} starting with ${strategies.length} strategies`);

    const engine = new ExecutionEngine(
        request.observations,
        strategies,
        request.initialCash ?? config.INITIAL_CASH,
        {
            allowShort: request.allowShort,
            failureProbability: request.failureProbability ?? config.FAILURE_PROBABILITY,
            random: request.random,
            seed: request.seed ?? config.SEED,
        }
    );

    const results = engine.run();
    const report = buildRunReport(results, {
        riskFreeRate: request.riskFreeRate ?? config.RISK_FREE_RATE,
        periodsPerYear: request.periodsPerYear ?? config.PERIODS_PER_YEAR,
    });

    logger.info(`${LOG_PREFIX.BACKTEST} ${runId} finished best=${report.best ?? 'n/a'}`);

    return { runId, results, report };
}
