/**
 * Registry of FlySight devices seen while scanning.
 *
 * A sighting is kept when the device is bonded or advertises the FlySight
 * company identifier. Unbonded devices carry a one-shot disappearance timer
 * that removes them if they are neither re-sighted nor connected before it
 * fires; bonded devices stay until they are unbonded.
 */

import { type PeripheralInfo, UNNAMED_DEVICE } from './models/peripheral';
import { MANUFACTURER_ID } from './protocol/constants';
import { readManufacturerId } from './protocol/responses';
import type { BondStore } from './storage/bond-store';
import type { AdvertisementData, PeripheralRef } from './transport/transport';

export interface PeripheralRegistryOptions {
  bondStore: BondStore;

  /** Delay before an unseen, unbonded, disconnected device is dropped */
  disappearanceTimeoutMs: number;

  onChange?: (peripherals: PeripheralInfo[]) => void;
}

/**
 * Check whether an advertisement comes from a FlySight.
 */
export function isFlySightAdvertisement(advertisement: AdvertisementData): boolean {
  return readManufacturerId(advertisement.manufacturerData) === MANUFACTURER_ID;
}

export class PeripheralRegistry {
  private records: PeripheralInfo[] = [];
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private bondedIds: Set<string>;

  constructor(private readonly options: PeripheralRegistryOptions) {
    this.bondedIds = options.bondStore.loadIdentifiers();
  }

  /**
   * Snapshot of all records in registry order.
   */
  get peripherals(): PeripheralInfo[] {
    return this.records.map((record) => ({ ...record }));
  }

  get bondedIdentifiers(): ReadonlySet<string> {
    return this.bondedIds;
  }

  get(id: string): PeripheralInfo | undefined {
    const record = this.find(id);
    return record ? { ...record } : undefined;
  }

  isBonded(id: string): boolean {
    return this.bondedIds.has(id);
  }

  /**
   * Has a disappearance timer pending for the device.
   */
  hasTimer(id: string): boolean {
    return this.timers.has(id);
  }

  /**
   * Apply the discovery policy to one advertisement.
   *
   * @returns True if the device qualified and its record was added or updated
   */
  handleAdvertisement(
    peripheral: PeripheralRef,
    advertisement: AdvertisementData,
    rssi: number
  ): boolean {
    const isBonded = this.bondedIds.has(peripheral.id);
    if (!isBonded && !isFlySightAdvertisement(advertisement)) {
      return false;
    }

    const existing = this.find(peripheral.id);
    if (existing) {
      existing.rssi = rssi;
      if (!isBonded) {
        this.startDisappearanceTimer(existing.id);
      }
    } else {
      this.records.push({
        id: peripheral.id,
        name: peripheral.name ?? advertisement.localName ?? UNNAMED_DEVICE,
        rssi,
        isConnected: false,
        isBonded,
      });
      if (!isBonded) {
        this.startDisappearanceTimer(peripheral.id);
      }
    }

    this.publish();
    return true;
  }

  /**
   * Make sure a record exists for a device the transport reports as connected.
   */
  ensureRecord(peripheral: PeripheralRef): PeripheralInfo {
    let record = this.find(peripheral.id);
    if (!record) {
      record = {
        id: peripheral.id,
        name: peripheral.name ?? UNNAMED_DEVICE,
        rssi: 0,
        isConnected: false,
        isBonded: this.bondedIds.has(peripheral.id),
      };
      this.records.push(record);
      this.publish();
    }
    return { ...record };
  }

  /**
   * Mark a device connected; connecting bonds it.
   */
  markConnected(id: string): void {
    const record = this.find(id);
    if (!record) {
      return;
    }
    record.isConnected = true;
    this.cancelTimer(id);
    this.bond(id);
    this.publish();
  }

  /**
   * Apply a disconnect request: unbonded records go away, bonded ones stay
   * listed as disconnected.
   */
  markDisconnected(id: string): void {
    const record = this.find(id);
    if (!record) {
      return;
    }

    if (!this.bondedIds.has(id)) {
      this.remove(id);
      return;
    }

    record.isConnected = false;
    this.startDisappearanceTimer(id);
    this.publish();
  }

  /**
   * Update the connection flag after the link dropped on its own.
   *
   * An unbonded record that loses its link gets a disappearance timer again.
   */
  setConnected(id: string, isConnected: boolean): void {
    const record = this.find(id);
    if (record && record.isConnected !== isConnected) {
      record.isConnected = isConnected;
      if (!isConnected) {
        this.startDisappearanceTimer(id);
      }
      this.publish();
    }
  }

  /**
   * Add a device to the bond set.
   */
  bond(id: string): void {
    if (!this.bondedIds.has(id)) {
      this.bondedIds.add(id);
      this.options.bondStore.saveIdentifiers(this.bondedIds);
      console.debug(`Bonded device ${id}`);
    }
    const record = this.find(id);
    if (record && !record.isBonded) {
      record.isBonded = true;
      this.cancelTimer(id);
      this.publish();
    }
  }

  /**
   * Remove a device from the bond set; a disconnected record is dropped.
   */
  unbond(id: string): void {
    if (this.bondedIds.delete(id)) {
      this.options.bondStore.saveIdentifiers(this.bondedIds);
      console.debug(`Unbonded device ${id}`);
    }
    const record = this.find(id);
    if (!record) {
      return;
    }
    if (!record.isConnected) {
      this.remove(id);
      return;
    }
    record.isBonded = false;
    this.publish();
  }

  /**
   * Order records by signal strength, strongest first.
   */
  sortByRSSI(): void {
    this.records.sort((a, b) => b.rssi - a.rssi);
    this.publish();
  }

  /**
   * Cancel every pending timer.
   */
  dispose(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private startDisappearanceTimer(id: string): void {
    if (this.bondedIds.has(id)) {
      return;
    }

    this.cancelTimer(id);
    this.timers.set(
      id,
      setTimeout(() => {
        this.timers.delete(id);
        const record = this.find(id);
        if (record && !record.isConnected) {
          console.debug(`Device ${record.name} (${id}) disappeared`);
          this.remove(id);
        }
      }, this.options.disappearanceTimeoutMs)
    );
  }

  private cancelTimer(id: string): void {
    const timer = this.timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
  }

  private remove(id: string): void {
    this.cancelTimer(id);
    const index = this.records.findIndex((record) => record.id === id);
    if (index !== -1) {
      this.records.splice(index, 1);
      this.publish();
    }
  }

  private find(id: string): PeripheralInfo | undefined {
    return this.records.find((record) => record.id === id);
  }

  private publish(): void {
    this.options.onChange?.(this.peripherals);
  }
}
