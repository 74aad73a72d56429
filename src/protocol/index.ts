/**
 * Protocol layer exports for FlySight BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './responses';
export * from './fat-time';
