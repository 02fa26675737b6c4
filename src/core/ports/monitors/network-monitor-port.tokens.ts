export const NETWORK_MONITORS: unique symbol = Symbol('NETWORK_MONITORS');
