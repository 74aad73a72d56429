/**
 * flysight-ble - TypeScript library for FlySight BLE devices
 *
 * Main entry point exporting the public API.
 */

// Core session API
export { FlySightManager, type FlySightManagerOptions } from './manager';
export { PeripheralRegistry, isFlySightAdvertisement } from './discovery';
export { TypedEventEmitter, type EventHandler, type FlySightEventMap } from './events';

// Exchanges
export { DirectoryListing, type DirectoryState } from './exchanges/directory-listing';
export { FileTransfer, computeProgress, type TransferResult } from './exchanges/file-transfer';
export { StartControl } from './exchanges/start-control';

// Models and wire protocol
export * from './models';
export * from './protocol';

// Transport and persistence
export * from './transport/transport';
export { NodeBleTransport, type NodeBleTransportOptions } from './transport/node-ble-transport';
export * from './storage/bond-store';

// Exceptions
export * from './exceptions';
