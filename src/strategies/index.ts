/**
 * Strategies Module
 *
 * INTEGRATION:
 *   const configs = loadStrategyConfigs('strategies.json');
 *   const strategies = createStrategies(configs);   // ConfigError on bad params
 *   const engine = new ExecutionEngine(observations, strategies, cash);
 */

export type {
    Strategy,
    StrategyKind,
    StrategyConfig,
    TaggedStrategy,
    MovingAverageCrossoverParams,
    MomentumParams,
    MacdParams,
} from './types';

export { RollingWindow } from './rollingWindow';
export { MovingAverageCrossoverStrategy } from './movingAverageCrossover';
export { MomentumStrategy } from './momentum';
export { MacdStrategy } from './macd';

export {
    createStrategy,
    createStrategies,
    DEFAULT_MA_CROSSOVER_PARAMS,
    DEFAULT_MOMENTUM_PARAMS,
    DEFAULT_MACD_PARAMS,
} from './factory';

export { loadStrategyConfigs, parseStrategyConfig, parseStrategyConfigs } from './loader';
