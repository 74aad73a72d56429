/**
 * Transport contract between the FlySight protocol layer and a BLE host.
 *
 * The host performs scanning, connection and GATT discovery and reports
 * every result asynchronously through a {@link TransportDelegate}.
 */

/**
 * Adapter power state, as reported by the host.
 */
export type TransportState = 'unknown' | 'unsupported' | 'poweredOff' | 'poweredOn';

export interface PeripheralRef {
  /** Stable identifier (BLE address or platform UUID) */
  id: string;

  name?: string;
}

export interface ServiceRef {
  peripheralId: string;
  uuid: string;
}

export interface CharacteristicRef {
  peripheralId: string;
  serviceUuid: string;
  uuid: string;
}

/**
 * Advertisement fields the protocol layer looks at.
 */
export interface AdvertisementData {
  localName?: string;

  /** Raw manufacturer data, company id in the first two bytes (little-endian) */
  manufacturerData?: Uint8Array;
}

/**
 * Callbacks a transport invokes as events arrive.
 */
export interface TransportDelegate {
  stateChanged(state: TransportState): void;
  deviceDiscovered(peripheral: PeripheralRef, advertisement: AdvertisementData, rssi: number): void;
  connected(peripheral: PeripheralRef): void;
  disconnected(peripheral: PeripheralRef, error?: Error): void;
  servicesDiscovered(peripheral: PeripheralRef, services: ServiceRef[], error?: Error): void;
  characteristicsDiscovered(
    service: ServiceRef,
    characteristics: CharacteristicRef[],
    error?: Error
  ): void;
  valueUpdated(characteristic: CharacteristicRef, data: Uint8Array | null, error?: Error): void;
}

/**
 * Operations a BLE host must provide.
 *
 * Results of connect and discovery calls arrive through the delegate; the
 * returned promises only report whether the request could be issued.
 */
export interface BLETransport {
  setDelegate(delegate: TransportDelegate | null): void;

  /**
   * @param serviceFilter - Service UUIDs to filter on, null for all devices
   * @param allowDuplicates - Report every advertisement, not only the first
   */
  scan(serviceFilter: string[] | null, allowDuplicates: boolean): Promise<void>;
  stopScan(): Promise<void>;

  connect(peripheral: PeripheralRef): Promise<void>;
  cancelConnection(peripheral: PeripheralRef): Promise<void>;
  discoverServices(peripheral: PeripheralRef): Promise<void>;
  discoverCharacteristics(service: ServiceRef): Promise<void>;

  /**
   * @param withResponse - Require a link-layer acknowledgment for the write
   */
  write(data: Uint8Array, characteristic: CharacteristicRef, withResponse: boolean): Promise<void>;
  setNotify(enabled: boolean, characteristic: CharacteristicRef): Promise<void>;

  /** Request a read; the value arrives through `valueUpdated`. */
  read(characteristic: CharacteristicRef): Promise<void>;
}
