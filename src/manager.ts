/**
 * Main FlySight BLE session class.
 */

import { type FlySightEventMap, TypedEventEmitter } from './events';
import { PeripheralRegistry } from './discovery';
import { BLEConnectionError, FlySightError, toConnectionError } from './exceptions';
import type { ExchangeChannel } from './exchanges/channel';
import { DirectoryListing } from './exchanges/directory-listing';
import { FileTransfer, type TransferResult } from './exchanges/file-transfer';
import { StartControl } from './exchanges/start-control';
import { type DirectoryEntry, leafName } from './models/directory';
import type { PeripheralInfo } from './models/peripheral';
import type { StartState } from './models/start';
import {
  CHARACTERISTIC_UUIDS,
  CRS_RX_UUID,
  CRS_TX_UUID,
  type CharacteristicUuid,
  START_RESULT_UUID,
} from './protocol/constants';
import { type BondStore, KeyValueBondStore } from './storage/bond-store';
import type {
  AdvertisementData,
  BLETransport,
  CharacteristicRef,
  PeripheralRef,
  ServiceRef,
  TransportDelegate,
  TransportState,
} from './transport/transport';

export interface FlySightManagerOptions {
  transport: BLETransport;

  /** Where bonded device ids are kept (default: in memory) */
  bondStore?: BondStore;

  /** Delay before an unseen, unbonded device is dropped (default: 500ms) */
  disappearanceTimeoutMs?: number;

  /** Give up on an unanswered directory request after this delay (default: never) */
  listingTimeoutMs?: number;

  /** Fail a download when no in-order packet arrives within this delay (default: never) */
  transferTimeoutMs?: number;
}

function isCharacteristicUuid(uuid: string): uuid is CharacteristicUuid {
  return CHARACTERISTIC_UUIDS.some((known) => known === uuid);
}

/**
 * FlySight session over a BLE transport.
 *
 * Tracks nearby devices, connects to one of them and runs the directory,
 * download and start pistol exchanges on its characteristics. State changes
 * are published as events.
 *
 * @example
 * ```typescript
 * const manager = new FlySightManager({
 *   transport: await NodeBleTransport.create(),
 *   bondStore: createFileBondStore('./flysight.json'),
 * });
 * manager.on('peripheralsChanged', (peripherals) => console.table(peripherals));
 *
 * await manager.connect(id);
 * await manager.waitForDirectory();
 * const result = await manager.downloadFile('/TRACKS/TRACK.CSV');
 * ```
 */
export class FlySightManager extends TypedEventEmitter<FlySightEventMap> {
  static readonly DISAPPEARANCE_TIMEOUT = 500;

  private readonly transport: BLETransport;
  private readonly registry: PeripheralRegistry;
  private readonly directory: DirectoryListing;
  private readonly transfer: FileTransfer;
  private readonly startControl: StartControl;
  private characteristics = new Map<CharacteristicUuid, CharacteristicRef>();
  private connectedId: string | null = null;
  private _transportState: TransportState = 'unknown';
  private _downloadProgress = 0;

  private readonly channel: ExchangeChannel = {
    isBound: (uuid) => this.characteristics.has(uuid),
    write: (uuid, data, withResponse) => {
      const characteristic = this.characteristics.get(uuid);
      if (!characteristic) {
        return Promise.reject(new BLEConnectionError(`Characteristic ${uuid} not bound`));
      }
      return this.transport.write(data, characteristic, withResponse);
    },
    setNotify: (uuid, enabled) => {
      const characteristic = this.characteristics.get(uuid);
      if (!characteristic) {
        return Promise.reject(new BLEConnectionError(`Characteristic ${uuid} not bound`));
      }
      return this.transport.setNotify(enabled, characteristic);
    },
  };

  private readonly delegate: TransportDelegate = {
    stateChanged: (state) => this.handleStateChanged(state),
    deviceDiscovered: (peripheral, advertisement, rssi) =>
      this.handleDeviceDiscovered(peripheral, advertisement, rssi),
    connected: (peripheral) => this.handleConnected(peripheral),
    disconnected: (peripheral, error) => this.handleDisconnected(peripheral, error),
    servicesDiscovered: (peripheral, services, error) =>
      this.handleServicesDiscovered(peripheral, services, error),
    characteristicsDiscovered: (service, characteristics, error) =>
      this.handleCharacteristicsDiscovered(service, characteristics, error),
    valueUpdated: (characteristic, data, error) =>
      this.handleValueUpdated(characteristic, data, error),
  };

  constructor(options: FlySightManagerOptions) {
    super();
    this.transport = options.transport;

    this.registry = new PeripheralRegistry({
      bondStore: options.bondStore ?? new KeyValueBondStore(),
      disappearanceTimeoutMs:
        options.disappearanceTimeoutMs ?? FlySightManager.DISAPPEARANCE_TIMEOUT,
      onChange: (peripherals) => this.emit('peripheralsChanged', peripherals),
    });

    this.directory = new DirectoryListing({
      channel: this.channel,
      listingTimeoutMs: options.listingTimeoutMs,
      onChange: (state) => this.emit('directoryChanged', state),
      onError: (error) => this.reportError(error),
    });

    this.transfer = new FileTransfer({
      channel: this.channel,
      receiveTimeoutMs: options.transferTimeoutMs,
      onProgress: (progress) => {
        this._downloadProgress = progress;
        this.emit('downloadProgress', progress);
      },
      onError: (error) => this.reportError(error),
    });

    this.startControl = new StartControl({
      channel: this.channel,
      onChange: (status) => this.emit('startStateChanged', status),
      onError: (error) => this.reportError(error),
    });

    this.transport.setDelegate(this.delegate);
  }

  get transportState(): TransportState {
    return this._transportState;
  }

  get peripherals(): PeripheralInfo[] {
    return this.registry.peripherals;
  }

  get connectedPeripheral(): PeripheralInfo | null {
    return this.connectedId ? this.registry.get(this.connectedId) ?? null : null;
  }

  get bondedIdentifiers(): ReadonlySet<string> {
    return this.registry.bondedIdentifiers;
  }

  get currentPath(): readonly string[] {
    return this.directory.path;
  }

  get directoryEntries(): readonly DirectoryEntry[] {
    return this.directory.entries;
  }

  get isAwaitingResponse(): boolean {
    return this.directory.isAwaitingResponse;
  }

  get downloadProgress(): number {
    return this._downloadProgress;
  }

  get isDownloading(): boolean {
    return this.transfer.isActive;
  }

  get state(): StartState {
    return this.startControl.state;
  }

  get startResultDate(): Date | null {
    return this.startControl.resultDate;
  }

  /**
   * Check whether a characteristic is bound on the connected device.
   */
  isCharacteristicBound(uuid: CharacteristicUuid): boolean {
    return this.characteristics.has(uuid);
  }

  /**
   * Scan for all devices, reporting repeated advertisements.
   */
  async startScan(): Promise<void> {
    try {
      await this.transport.scan(null, true);
    } catch (error) {
      throw toConnectionError('Failed to start scan', error);
    }
  }

  async stopScan(): Promise<void> {
    try {
      await this.transport.stopScan();
    } catch (error) {
      throw toConnectionError('Failed to stop scan', error);
    }
  }

  sortPeripheralsByRSSI(): void {
    this.registry.sortByRSSI();
  }

  /**
   * Connect to a device from the registry. Connecting bonds the device.
   *
   * @throws {BLEConnectionError} If the device is unknown, another device is connected, or the request fails
   */
  async connect(id: string): Promise<void> {
    const record = this.registry.get(id);
    if (!record) {
      throw new BLEConnectionError(`Unknown device ${id}`);
    }
    if (this.connectedId !== null && this.connectedId !== id) {
      throw new BLEConnectionError(
        `Already connected to ${this.connectedId}; disconnect first`
      );
    }

    this.registry.markConnected(id);
    this.connectedId = id;
    this.emit('connectionChanged', this.connectedPeripheral);

    try {
      await this.transport.connect({ id, name: record.name });
    } catch (error) {
      this.registry.setConnected(id, false);
      if (this.connectedId === id) {
        this.connectedId = null;
        this.emit('connectionChanged', null);
      }
      throw toConnectionError(`Failed to connect to ${record.name}`, error);
    }
  }

  /**
   * Disconnect from a device. Unbonded devices leave the registry.
   *
   * @throws {BLEConnectionError} If the request fails
   */
  async disconnect(id: string): Promise<void> {
    const record = this.registry.get(id);
    this.registry.markDisconnected(id);

    try {
      await this.transport.cancelConnection({ id, name: record?.name });
    } catch (error) {
      throw toConnectionError(`Failed to disconnect from ${record?.name ?? id}`, error);
    }
  }

  bond(id: string): void {
    this.registry.bond(id);
  }

  unbond(id: string): void {
    this.registry.unbond(id);
  }

  /**
   * Enter a subdirectory and list it.
   *
   * @returns False if the previous listing has not been answered yet
   */
  changeDirectory(name: string): boolean {
    return this.directory.changeDirectory(name);
  }

  /**
   * Go to the parent directory and list it.
   *
   * @returns False while awaiting a listing or when already at root
   */
  goUpOneDirectoryLevel(): boolean {
    return this.directory.goUp();
  }

  refreshDirectory(): boolean {
    return this.directory.refresh();
  }

  /**
   * Wait for the outstanding directory request to be answered.
   */
  waitForDirectory(): Promise<DirectoryEntry[]> {
    return this.directory.settled();
  }

  /**
   * Download a file from the connected device.
   *
   * The expected size comes from the current listing when the file is in it.
   *
   * @param filePath - Absolute path, e.g. "/TRACKS/24-05-25/TRACK.CSV"
   * @throws {BLEConnectionError} If not connected or RX/TX are not bound
   * @throws {TransferInProgressError} If another download is running
   */
  downloadFile(filePath: string): Promise<TransferResult> {
    if (this.connectedId === null) {
      return Promise.reject(new BLEConnectionError('No connected peripheral'));
    }

    const entry = this.directory.findEntry(leafName(filePath));
    this._downloadProgress = 0;
    return this.transfer.start(filePath, entry?.size ?? 0);
  }

  /**
   * Cancel the running download; its promise resolves as cancelled.
   *
   * @returns True if a download was running
   */
  cancelDownload(): boolean {
    return this.transfer.cancel();
  }

  sendStartCommand(): Promise<void> {
    return this.startControl.sendStart();
  }

  sendCancelCommand(): Promise<void> {
    return this.startControl.sendCancel();
  }

  /**
   * Wait for the start time reported after {@link sendStartCommand}.
   */
  waitForStartResult(): Promise<Date> {
    return this.startControl.waitForResult();
  }

  /**
   * Detach from the transport and stop all timers.
   */
  dispose(): void {
    this.transport.setDelegate(null);
    this.registry.dispose();
    this.removeAllListeners();
  }

  private handleStateChanged(state: TransportState): void {
    this._transportState = state;
    console.log(`Bluetooth adapter state: ${state}`);

    if (state === 'poweredOn') {
      void this.startScan().catch((error: unknown) => {
        this.reportError(toConnectionError('Failed to start scan', error));
      });
    }
  }

  private handleDeviceDiscovered(
    peripheral: PeripheralRef,
    advertisement: AdvertisementData,
    rssi: number
  ): void {
    this.registry.handleAdvertisement(peripheral, advertisement, rssi);
  }

  private handleConnected(peripheral: PeripheralRef): void {
    console.log(
      `Connected to ${peripheral.name ?? 'Unknown Device'} (peripheral ID = ${peripheral.id})`
    );

    this.registry.ensureRecord(peripheral);
    if (this.connectedId === null) {
      this.connectedId = peripheral.id;
      this.registry.markConnected(peripheral.id);
      this.emit('connectionChanged', this.connectedPeripheral);
    }

    void this.transport.discoverServices(peripheral).catch((error: unknown) => {
      this.reportError(toConnectionError('Service discovery failed', error));
    });
  }

  private handleDisconnected(peripheral: PeripheralRef, error?: Error): void {
    console.log(
      `Disconnected from ${peripheral.name ?? 'Unknown Device'} (peripheral ID = ${peripheral.id})` +
        (error ? `: ${error.message}` : '')
    );

    this.registry.setConnected(peripheral.id, false);
    if (this.connectedId !== peripheral.id) {
      return;
    }

    const reason = new BLEConnectionError(
      error ? `Disconnected: ${error.message}` : 'Disconnected'
    );

    // Bindings go first so no exchange tries to write on its way out
    this.characteristics.clear();
    this.directory.reset(reason);
    this.transfer.fail(reason);
    this.startControl.reset(reason);
    this.connectedId = null;
    this.emit('connectionChanged', null);
  }

  private handleServicesDiscovered(
    peripheral: PeripheralRef,
    services: ServiceRef[],
    error?: Error
  ): void {
    if (error) {
      console.warn(`Error discovering services: ${error.message}`);
      this.reportError(toConnectionError('Service discovery failed', error));
      return;
    }

    console.debug(`Discovered ${services.length} services on ${peripheral.id}`);
    for (const service of services) {
      void this.transport.discoverCharacteristics(service).catch((failure: unknown) => {
        this.reportError(toConnectionError('Characteristic discovery failed', failure));
      });
    }
  }

  private handleCharacteristicsDiscovered(
    service: ServiceRef,
    characteristics: CharacteristicRef[],
    error?: Error
  ): void {
    if (error) {
      console.warn(`Error discovering characteristics: ${error.message}`);
      this.reportError(toConnectionError('Characteristic discovery failed', error));
      return;
    }
    if (service.peripheralId !== this.connectedId) {
      return;
    }

    let boundCrs = false;
    for (const characteristic of characteristics) {
      const uuid = characteristic.uuid.toLowerCase();
      if (!isCharacteristicUuid(uuid)) {
        continue;
      }
      this.characteristics.set(uuid, characteristic);

      if (uuid === CRS_TX_UUID || uuid === START_RESULT_UUID) {
        this.enableNotifications(uuid);
      }
      if (uuid === CRS_RX_UUID) {
        void this.transport.read(characteristic).catch((failure: unknown) => {
          this.reportError(toConnectionError('Failed to read RX characteristic', failure));
        });
      }
      if (uuid === CRS_TX_UUID || uuid === CRS_RX_UUID) {
        boundCrs = true;
      }
    }

    if (boundCrs && this.characteristics.has(CRS_TX_UUID) && this.characteristics.has(CRS_RX_UUID)) {
      this.directory.load();
    }
  }

  private handleValueUpdated(
    characteristic: CharacteristicRef,
    data: Uint8Array | null,
    error?: Error
  ): void {
    const uuid = characteristic.uuid.toLowerCase();

    if (error || !data) {
      const reason = toConnectionError(
        `Error reading characteristic ${uuid}`,
        error ?? new Error('No value')
      );
      console.warn(reason.message);
      this.directory.fail(reason);
      if (uuid === CRS_TX_UUID) {
        this.transfer.fail(reason);
      }
      return;
    }

    if (uuid === CRS_TX_UUID) {
      // Outside an outstanding listing, a download keeps its data packets out of the entries
      if (this.directory.isAwaitingResponse || !this.transfer.isActive) {
        this.directory.handleNotification(data);
      }
      if (this.transfer.isActive) {
        this.transfer.handleNotification(data);
      }
    } else if (uuid === START_RESULT_UUID) {
      this.startControl.handleNotification(data);
    } else if (uuid === CRS_RX_UUID) {
      console.debug(`RX characteristic value: ${data.length} bytes`);
    }
  }

  private enableNotifications(uuid: CharacteristicUuid): void {
    void this.channel.setNotify(uuid, true).catch((error: unknown) => {
      this.reportError(toConnectionError(`Failed to enable notifications on ${uuid}`, error));
    });
  }

  private reportError(error: FlySightError): void {
    this.emit('exchangeError', error);
  }
}
