/**
 * Portfolio - Type Definitions
 */

/**
 * Holding in a single symbol.
 *
 * averagePrice follows running-average-cost accounting: it is recomputed on
 * buys and left as-is on sells. There is no FIFO/LIFO lot tracking.
 */
export interface Position {
    symbol: string;
    quantity: number;
    averagePrice: number;
}

/**
 * Latest known price per symbol
 */
export type PriceMap = ReadonlyMap<string, number>;

/**
 * Plain-data view of a portfolio for reporters
 */
export interface PortfolioSnapshot {
    cash: number;
    positions: Position[];
}
