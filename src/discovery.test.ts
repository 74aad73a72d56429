import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PeripheralRegistry, isFlySightAdvertisement } from './discovery';
import type { PeripheralInfo } from './models/peripheral';
import { KeyValueBondStore } from './storage/bond-store';
import type { AdvertisementData } from './transport/transport';

const FLYSIGHT_ADV: AdvertisementData = { manufacturerData: Uint8Array.of(0xdb, 0x09, 0x01) };
const OTHER_ADV: AdvertisementData = { manufacturerData: Uint8Array.of(0x4c, 0x00, 0x02) };

describe('isFlySightAdvertisement', () => {
  it('matches the FlySight company id', () => {
    expect(isFlySightAdvertisement(FLYSIGHT_ADV)).toBe(true);
    expect(isFlySightAdvertisement(OTHER_ADV)).toBe(false);
  });

  it('rejects missing or truncated manufacturer data', () => {
    expect(isFlySightAdvertisement({})).toBe(false);
    expect(isFlySightAdvertisement({ manufacturerData: Uint8Array.of(0xdb, 0x09) })).toBe(false);
  });
});

describe('PeripheralRegistry', () => {
  let bondStore: KeyValueBondStore;
  let snapshots: PeripheralInfo[][];

  const createRegistry = () =>
    new PeripheralRegistry({
      bondStore,
      disappearanceTimeoutMs: 500,
      onChange: (peripherals) => snapshots.push(peripherals),
    });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    bondStore = new KeyValueBondStore();
    snapshots = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('adds a FlySight advertisement and drops it after the disappearance timeout', () => {
    const registry = createRegistry();

    expect(registry.handleAdvertisement({ id: 'dev-1', name: 'FlySight' }, FLYSIGHT_ADV, -60)).toBe(
      true
    );
    expect(registry.peripherals).toEqual([
      { id: 'dev-1', name: 'FlySight', rssi: -60, isConnected: false, isBonded: false },
    ]);
    expect(registry.hasTimer('dev-1')).toBe(true);

    vi.advanceTimersByTime(499);
    expect(registry.get('dev-1')).toBeDefined();
    vi.advanceTimersByTime(1);
    expect(registry.get('dev-1')).toBeUndefined();
    expect(snapshots[snapshots.length - 1]).toEqual([]);
  });

  it('restarts the timer on every sighting', () => {
    const registry = createRegistry();

    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);
    vi.advanceTimersByTime(400);
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -55);
    vi.advanceTimersByTime(400);

    expect(registry.get('dev-1')?.rssi).toBe(-55);
    vi.advanceTimersByTime(100);
    expect(registry.get('dev-1')).toBeUndefined();
  });

  it('ignores devices that are neither bonded nor FlySights', () => {
    const registry = createRegistry();

    expect(registry.handleAdvertisement({ id: 'phone' }, OTHER_ADV, -40)).toBe(false);
    expect(registry.handleAdvertisement({ id: 'tag' }, {}, -40)).toBe(false);
    expect(registry.peripherals).toEqual([]);
    expect(snapshots).toEqual([]);
  });

  it('keeps bonded devices without a timer', () => {
    bondStore.saveIdentifiers(new Set(['dev-b']));
    const registry = createRegistry();

    expect(registry.handleAdvertisement({ id: 'dev-b', name: 'Mine' }, {}, -70)).toBe(true);
    expect(registry.get('dev-b')?.isBonded).toBe(true);
    expect(registry.hasTimer('dev-b')).toBe(false);

    vi.advanceTimersByTime(10_000);
    expect(registry.get('dev-b')).toBeDefined();
  });

  it('names devices from the peripheral, the advertisement, or a placeholder', () => {
    const registry = createRegistry();

    registry.handleAdvertisement({ id: 'a', name: 'Peripheral' }, { ...FLYSIGHT_ADV, localName: 'Adv' }, -50);
    registry.handleAdvertisement({ id: 'b' }, { ...FLYSIGHT_ADV, localName: 'Adv' }, -50);
    registry.handleAdvertisement({ id: 'c' }, FLYSIGHT_ADV, -50);

    expect(registry.peripherals.map((p) => p.name)).toEqual(['Peripheral', 'Adv', 'Unnamed Device']);
  });

  it('bonds on connect and keeps the device listed', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);

    registry.markConnected('dev-1');

    expect(registry.get('dev-1')).toMatchObject({ isConnected: true, isBonded: true });
    expect(registry.hasTimer('dev-1')).toBe(false);
    expect(bondStore.loadIdentifiers()).toEqual(new Set(['dev-1']));

    vi.advanceTimersByTime(1000);
    expect(registry.get('dev-1')).toBeDefined();
  });

  it('keeps a bonded device as disconnected after disconnect', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);
    registry.markConnected('dev-1');

    registry.markDisconnected('dev-1');
    vi.advanceTimersByTime(1000);

    expect(registry.get('dev-1')).toMatchObject({ isConnected: false, isBonded: true });
  });

  it('removes an unbonded device on disconnect', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);
    registry.markConnected('dev-1');
    registry.unbond('dev-1');
    expect(registry.get('dev-1')).toMatchObject({ isConnected: true, isBonded: false });

    registry.markDisconnected('dev-1');

    expect(registry.get('dev-1')).toBeUndefined();
  });

  it('removes a disconnected device when it is unbonded', () => {
    bondStore.saveIdentifiers(new Set(['dev-b', 'dev-c']));
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-b' }, {}, -70);

    registry.unbond('dev-b');

    expect(registry.get('dev-b')).toBeUndefined();
    expect(bondStore.loadIdentifiers()).toEqual(new Set(['dev-c']));
  });

  it('drops an unbonded device after its link is lost and it is not seen again', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);
    registry.markConnected('dev-1');
    registry.unbond('dev-1');

    registry.setConnected('dev-1', false);
    expect(registry.hasTimer('dev-1')).toBe(true);
    vi.advanceTimersByTime(500);

    expect(registry.get('dev-1')).toBeUndefined();
  });

  it('keeps a bonded device without a timer after its link is lost', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);
    registry.markConnected('dev-1');

    registry.setConnected('dev-1', false);
    vi.advanceTimersByTime(1000);

    expect(registry.hasTimer('dev-1')).toBe(false);
    expect(registry.get('dev-1')).toMatchObject({ isConnected: false, isBonded: true });
  });

  it('does not drop a connected device when its timer fires', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);

    registry.setConnected('dev-1', true);
    vi.advanceTimersByTime(500);

    expect(registry.get('dev-1')?.isConnected).toBe(true);
  });

  it('sorts by signal strength, strongest first', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'far' }, FLYSIGHT_ADV, -80);
    registry.handleAdvertisement({ id: 'near' }, FLYSIGHT_ADV, -40);
    registry.handleAdvertisement({ id: 'mid' }, FLYSIGHT_ADV, -60);

    registry.sortByRSSI();

    expect(registry.peripherals.map((p) => p.id)).toEqual(['near', 'mid', 'far']);
  });

  it('publishes copies of its records', () => {
    const registry = createRegistry();
    registry.handleAdvertisement({ id: 'dev-1' }, FLYSIGHT_ADV, -60);

    snapshots[0][0].rssi = 0;

    expect(registry.get('dev-1')?.rssi).toBe(-60);
  });
});
