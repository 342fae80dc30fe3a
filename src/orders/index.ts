export { Order } from './order';
export type { OrderStatus } from './order';
export { createOrder, parseSignal } from './validation';
export type { OrderContext } from './validation';
export { executeOrder } from './execution';
