export const NOTIFICATION_SINK: unique symbol = Symbol('NOTIFICATION_SINK');
