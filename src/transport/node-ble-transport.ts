/**
 * BLE transport for Node.js on Linux, built on node-ble (BlueZ over D-Bus).
 *
 * BlueZ has no advertisement callback, so scanning polls the adapter's
 * device list. Devices whose RSSI is unavailable are out of range and are
 * not reported, which lets the registry's disappearance timers run.
 */

import { Buffer } from 'node:buffer';
import NodeBle from 'node-ble';
import { BLEConnectionError, toConnectionError } from '../exceptions';
import type {
  AdvertisementData,
  BLETransport,
  CharacteristicRef,
  PeripheralRef,
  ServiceRef,
  TransportDelegate,
} from './transport';

/**
 * Subset of node-ble's GattCharacteristic used here.
 */
export interface BleCharacteristic {
  readValue(offset?: number): Promise<Buffer>;
  writeValue(
    buffer: Buffer,
    options: { offset?: number; type?: 'reliable' | 'request' | 'command' }
  ): Promise<void>;
  startNotifications(): Promise<void>;
  stopNotifications(): Promise<void>;
  on(event: 'valuechanged', listener: (buffer: Buffer) => void): unknown;
  removeAllListeners(event: 'valuechanged'): unknown;
}

export interface BleGattService {
  characteristics(): Promise<string[]>;
  getCharacteristic(uuid: string): Promise<BleCharacteristic>;
}

export interface BleGattServer {
  services(): Promise<string[]>;
  getPrimaryService(uuid: string): Promise<BleGattService>;
}

/**
 * Subset of node-ble's Device used here.
 */
export interface BleDevice {
  getName(): Promise<string>;
  getRSSI(): Promise<unknown>;
  getManufacturerData(): Promise<Record<string, unknown>>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  gatt(): Promise<BleGattServer>;
  on(event: 'disconnect', listener: (state: { connected: boolean }) => void): unknown;
  removeAllListeners(event: 'disconnect'): unknown;
}

/**
 * Subset of node-ble's Adapter used here.
 */
export interface BleAdapter {
  isPowered(): Promise<unknown>;
  isDiscovering(): Promise<unknown>;
  startDiscovery(): Promise<void>;
  stopDiscovery(): Promise<void>;
  devices(): Promise<string[]>;
  getDevice(uuid: string): Promise<BleDevice>;
}

export interface NodeBleTransportOptions {
  /** Interval between device list polls while scanning (default: 250ms) */
  pollIntervalMs?: number;

  /** Called by {@link NodeBleTransport.destroy} to release the D-Bus connection */
  onDestroy?: () => void;
}

/**
 * Rebuild raw manufacturer data from BlueZ's company-id keyed dictionary.
 *
 * BlueZ strips the company identifier; it is put back in front as two
 * little-endian bytes, the layout advertisements carry on air.
 */
export function toRawManufacturerData(
  manufacturerData: Record<string, unknown>
): Uint8Array | undefined {
  for (const [key, value] of Object.entries(manufacturerData)) {
    const companyId = Number(key);
    const payload = variantBytes(value);
    if (!Number.isInteger(companyId) || !payload) {
      continue;
    }
    const raw = new Uint8Array(2 + payload.length);
    raw[0] = companyId & 0xff;
    raw[1] = (companyId >> 8) & 0xff;
    raw.set(payload, 2);
    return raw;
  }
  return undefined;
}

function variantBytes(value: unknown): Uint8Array | null {
  if (value instanceof Uint8Array) {
    return value;
  }
  // dbus-next wraps dictionary values in a Variant { signature, value }
  if (typeof value === 'object' && value !== null && 'value' in value) {
    return variantBytes(value.value);
  }
  return null;
}

/**
 * Read a D-Bus property that BlueZ omits when the device did not advertise it.
 */
async function optionalProperty<T>(read: () => Promise<T>): Promise<T | undefined> {
  try {
    return await read();
  } catch {
    return undefined;
  }
}

function characteristicKey(peripheralId: string, uuid: string): string {
  return `${peripheralId}/${uuid.toLowerCase()}`;
}

export class NodeBleTransport implements BLETransport {
  static readonly POLL_INTERVAL = 250;

  private delegate: TransportDelegate | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private reported = new Set<string>();
  private allowDuplicates = true;
  private devices = new Map<string, BleDevice>();
  private servers = new Map<string, BleGattServer>();
  private characteristics = new Map<string, BleCharacteristic>();

  constructor(
    private readonly adapter: BleAdapter,
    private readonly options: NodeBleTransportOptions = {}
  ) {}

  /**
   * Open the system D-Bus and use the default Bluetooth adapter.
   */
  static async create(options: NodeBleTransportOptions = {}): Promise<NodeBleTransport> {
    const { bluetooth, destroy } = NodeBle.createBluetooth();
    try {
      const adapter = await bluetooth.defaultAdapter();
      return new NodeBleTransport(adapter, { ...options, onDestroy: destroy });
    } catch (error) {
      destroy();
      throw toConnectionError('No Bluetooth adapter available', error);
    }
  }

  setDelegate(delegate: TransportDelegate | null): void {
    this.delegate = delegate;
    if (delegate) {
      void this.reportPowerState();
    }
  }

  async scan(serviceFilter: string[] | null, allowDuplicates: boolean): Promise<void> {
    if (serviceFilter) {
      console.warn('Service filters are not applied by the node-ble transport');
    }

    this.allowDuplicates = allowDuplicates;
    this.reported.clear();

    if (!(await this.isDiscovering())) {
      await this.adapter.startDiscovery();
    }

    if (this.pollTimer === null) {
      const interval = this.options.pollIntervalMs ?? NodeBleTransport.POLL_INTERVAL;
      this.pollTimer = setInterval(() => {
        void this.poll();
      }, interval);
    }
  }

  async stopScan(): Promise<void> {
    if (this.pollTimer !== null) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (await this.isDiscovering()) {
      await this.adapter.stopDiscovery();
    }
  }

  async connect(peripheral: PeripheralRef): Promise<void> {
    const device = await this.getDevice(peripheral.id);

    device.removeAllListeners('disconnect');
    device.on('disconnect', () => {
      this.forget(peripheral.id);
      this.delegate?.disconnected(peripheral);
    });

    await device.connect();
    this.delegate?.connected(peripheral);
  }

  async cancelConnection(peripheral: PeripheralRef): Promise<void> {
    const device = this.devices.get(peripheral.id);
    if (!device) {
      return;
    }
    await device.disconnect();
  }

  async discoverServices(peripheral: PeripheralRef): Promise<void> {
    try {
      const device = await this.getDevice(peripheral.id);
      const server = await device.gatt();
      this.servers.set(peripheral.id, server);

      const uuids = await server.services();
      this.delegate?.servicesDiscovered(
        peripheral,
        uuids.map((uuid) => ({ peripheralId: peripheral.id, uuid: uuid.toLowerCase() }))
      );
    } catch (error) {
      this.delegate?.servicesDiscovered(
        peripheral,
        [],
        toConnectionError('Service discovery failed', error)
      );
    }
  }

  async discoverCharacteristics(service: ServiceRef): Promise<void> {
    const server = this.servers.get(service.peripheralId);
    if (!server) {
      this.delegate?.characteristicsDiscovered(
        service,
        [],
        new BLEConnectionError(`Services of ${service.peripheralId} not discovered`)
      );
      return;
    }

    try {
      const gattService = await server.getPrimaryService(service.uuid);
      const refs: CharacteristicRef[] = [];

      for (const uuid of await gattService.characteristics()) {
        const ref: CharacteristicRef = {
          peripheralId: service.peripheralId,
          serviceUuid: service.uuid,
          uuid: uuid.toLowerCase(),
        };
        const characteristic = await gattService.getCharacteristic(uuid);
        characteristic.removeAllListeners('valuechanged');
        characteristic.on('valuechanged', (buffer) => {
          this.delegate?.valueUpdated(ref, new Uint8Array(buffer));
        });

        this.characteristics.set(characteristicKey(ref.peripheralId, ref.uuid), characteristic);
        refs.push(ref);
      }

      this.delegate?.characteristicsDiscovered(service, refs);
    } catch (error) {
      this.delegate?.characteristicsDiscovered(
        service,
        [],
        toConnectionError('Characteristic discovery failed', error)
      );
    }
  }

  async write(
    data: Uint8Array,
    characteristic: CharacteristicRef,
    withResponse: boolean
  ): Promise<void> {
    await this.getCharacteristic(characteristic).writeValue(Buffer.from(data), {
      offset: 0,
      type: withResponse ? 'request' : 'command',
    });
  }

  async setNotify(enabled: boolean, characteristic: CharacteristicRef): Promise<void> {
    const gattCharacteristic = this.getCharacteristic(characteristic);
    if (enabled) {
      await gattCharacteristic.startNotifications();
    } else {
      await gattCharacteristic.stopNotifications();
    }
  }

  async read(characteristic: CharacteristicRef): Promise<void> {
    try {
      const value = await this.getCharacteristic(characteristic).readValue();
      this.delegate?.valueUpdated(characteristic, new Uint8Array(value));
    } catch (error) {
      this.delegate?.valueUpdated(
        characteristic,
        null,
        toConnectionError('Read failed', error)
      );
    }
  }

  /**
   * Stop scanning and release the D-Bus connection.
   */
  async destroy(): Promise<void> {
    await this.stopScan();
    this.options.onDestroy?.();
  }

  private async isDiscovering(): Promise<boolean> {
    return String(await this.adapter.isDiscovering()) === 'true';
  }

  private async reportPowerState(): Promise<void> {
    try {
      const powered = String(await this.adapter.isPowered()) === 'true';
      this.delegate?.stateChanged(powered ? 'poweredOn' : 'poweredOff');
    } catch (error) {
      console.warn(
        'Unable to read adapter power state: ' +
          (error instanceof Error ? error.message : String(error))
      );
      this.delegate?.stateChanged('unknown');
    }
  }

  private async poll(): Promise<void> {
    if (this.polling) {
      return;
    }
    this.polling = true;
    try {
      for (const id of await this.adapter.devices()) {
        if (!this.allowDuplicates && this.reported.has(id)) {
          continue;
        }
        await this.reportDevice(id);
      }
    } catch (error) {
      console.warn(
        'Device poll failed: ' + (error instanceof Error ? error.message : String(error))
      );
    } finally {
      this.polling = false;
    }
  }

  private async reportDevice(id: string): Promise<void> {
    const device = await this.getDevice(id);

    // No RSSI: cached by BlueZ but not currently advertising
    const rssi = Number(await optionalProperty(() => device.getRSSI()));
    if (!Number.isFinite(rssi)) {
      return;
    }

    const localName = await optionalProperty(() => device.getName());
    const manufacturerData = await optionalProperty(() => device.getManufacturerData());
    const advertisement: AdvertisementData = {
      localName,
      manufacturerData: manufacturerData ? toRawManufacturerData(manufacturerData) : undefined,
    };

    this.reported.add(id);
    this.delegate?.deviceDiscovered(
      { id, name: advertisement.localName },
      advertisement,
      rssi
    );
  }

  private async getDevice(id: string): Promise<BleDevice> {
    let device = this.devices.get(id);
    if (!device) {
      device = await this.adapter.getDevice(id);
      this.devices.set(id, device);
    }
    return device;
  }

  private getCharacteristic(ref: CharacteristicRef): BleCharacteristic {
    const characteristic = this.characteristics.get(characteristicKey(ref.peripheralId, ref.uuid));
    if (!characteristic) {
      throw new BLEConnectionError(`Characteristic ${ref.uuid} not discovered`);
    }
    return characteristic;
  }

  private forget(peripheralId: string): void {
    this.servers.delete(peripheralId);
    for (const key of [...this.characteristics.keys()]) {
      if (key.startsWith(`${peripheralId}/`)) {
        this.characteristics.get(key)?.removeAllListeners('valuechanged');
        this.characteristics.delete(key);
      }
    }
  }
}
