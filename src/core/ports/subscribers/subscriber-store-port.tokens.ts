export const SUBSCRIBER_STORE: unique symbol = Symbol('SUBSCRIBER_STORE');
