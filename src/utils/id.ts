/**
 * ID Generation Utilities
 *
 * Order ids are fresh uuid v4 values. They label orders in reports only;
 * nothing in the replay depends on them, so they stay out of the seeded
 * random stream.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique id for a new order.
 *
 * @example
 * ```typescript
 * const orderId = generateOrderId();
 * // Returns: "ord_550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateOrderId(): string {
    return `ord_${uuidv4()}`;
}

/**
 * Generate a short run label: run_{epochMs}_{8 hex chars}
 */
export function generateRunId(now: number = Date.now()): string {
    const suffix = uuidv4().split('-')[0];
    return `run_${now}_${suffix}`;
}
