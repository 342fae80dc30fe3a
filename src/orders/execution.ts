/**
 * Order Execution - Single Simulated Fill Attempt
 */

import { ExecutionError } from '../core/errors';
import { ENGINE_CONFIG } from '../config/constants';
import { RandomSource } from '../utils/random';
import { Order } from './order';
import { OrderContext } from './validation';

/**
 * Attempt to fill a validated order.
 *
 * One uniform draw; below failureProbability the market rejects the order
 * and the portfolio is left alone. No retries. The caller owns the status
 * transition.
 */
export function executeOrder(
    context: OrderContext,
    order: Order,
    random: RandomSource,
    failureProbability: number = ENGINE_CONFIG.FAILURE_PROBABILITY
): void {
    const draw = random();
    if (draw < failureProbability) {
        throw new ExecutionError(`Market rejected order: ${order.toString()}`, {
            orderId: order.id,
            draw,
            failureProbability,
        });
    }

    context.portfolio.applyTrade(order.symbol, order.quantity, order.price);
}
