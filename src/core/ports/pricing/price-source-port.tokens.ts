export const PRICE_SOURCE_PORT: unique symbol = Symbol('PRICE_SOURCE_PORT');
