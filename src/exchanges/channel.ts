/**
 * Characteristic access shared by the FlySight exchanges.
 */

import type { CharacteristicUuid } from '../protocol/constants';

/**
 * Write/notify access to the characteristics bound on the connected device.
 *
 * Implementations reject with BLEConnectionError when the characteristic
 * is not bound.
 */
export interface ExchangeChannel {
  isBound(uuid: CharacteristicUuid): boolean;
  write(uuid: CharacteristicUuid, data: Uint8Array, withResponse: boolean): Promise<void>;
  setNotify(uuid: CharacteristicUuid, enabled: boolean): Promise<void>;
}

/**
 * Handle of a pending caller completion.
 */
export interface Deferred<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}
