export type { Position, PriceMap, PortfolioSnapshot } from './types';
export { Portfolio } from './portfolio';
