import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BLEConnectionError, BLETimeoutError, TransferInProgressError } from '../exceptions';
import { CRS_RX_UUID, CRS_TX_UUID } from '../protocol/constants';
import { FakeChannel } from '../testing/fakes';
import { FileTransfer, computeProgress } from './file-transfer';

const packet = (n: number, ...payload: number[]) => Uint8Array.of(0x10, n, ...payload);

describe('FileTransfer', () => {
  let channel: FakeChannel;

  beforeEach(() => {
    channel = new FakeChannel();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('reassembles in-order packets and acknowledges each one', async () => {
    const progress: number[] = [];
    const transfer = new FileTransfer({ channel, onProgress: (p) => progress.push(p) });

    const result = transfer.start('/TRACK.CSV', 6);
    transfer.handleNotification(packet(0, 1, 2));
    transfer.handleNotification(packet(1, 3, 4));
    transfer.handleNotification(packet(2, 5, 6));
    transfer.handleNotification(packet(3));

    const outcome = await result;
    expect(outcome.status).toBe('completed');
    expect(Array.from(outcome.data)).toEqual([1, 2, 3, 4, 5, 6]);

    const rxWrites = channel.writesTo(CRS_RX_UUID);
    expect(rxWrites[0]).toEqual([
      0x02, 0, 0, 0, 0, 0, 0, 0, 0, ...new TextEncoder().encode('/TRACK.CSV'),
    ]);
    expect(rxWrites.slice(1)).toEqual([
      [0x12, 0],
      [0x12, 1],
      [0x12, 2],
      [0x12, 3],
    ]);
    expect(channel.writes.every((write) => !write.withResponse)).toBe(true);
    expect(progress).toEqual([0, 1 / 3, 2 / 3, 1, 1]);
    expect(channel.notifications).toEqual([
      { uuid: CRS_TX_UUID, enabled: true },
      { uuid: CRS_TX_UUID, enabled: false },
    ]);
    expect(transfer.isActive).toBe(false);
  });

  it('drops out-of-order packets without acknowledging them', async () => {
    const transfer = new FileTransfer({ channel });

    const result = transfer.start('/A.TXT', 3);
    transfer.handleNotification(packet(0, 0xa));
    transfer.handleNotification(packet(2, 0xc));
    transfer.handleNotification(packet(1, 0xb));
    transfer.handleNotification(packet(2, 0xc));
    transfer.handleNotification(packet(3));

    const outcome = await result;
    expect(Array.from(outcome.data)).toEqual([0xa, 0xb, 0xc]);
    expect(channel.writesTo(CRS_RX_UUID).slice(1)).toEqual([
      [0x12, 0],
      [0x12, 1],
      [0x12, 2],
      [0x12, 3],
    ]);
  });

  it('wraps packet numbers after 255', async () => {
    const transfer = new FileTransfer({ channel });

    const result = transfer.start('/BIG.BIN', 300);
    for (let i = 0; i < 300; i++) {
      transfer.handleNotification(packet(i & 0xff, i & 0xff));
    }
    transfer.handleNotification(packet(300 & 0xff));

    const outcome = await result;
    expect(outcome.data.length).toBe(300);
    expect(outcome.data[255]).toBe(255);
    expect(outcome.data[256]).toBe(0);
    const acks = channel.writesTo(CRS_RX_UUID).slice(1);
    expect(acks.length).toBe(301);
    expect(acks[256]).toEqual([0x12, 0]);
    expect(acks[300]).toEqual([0x12, 44]);
  });

  it('reports zero progress until completion when the size is unknown', async () => {
    const progress: number[] = [];
    const transfer = new FileTransfer({ channel, onProgress: (p) => progress.push(p) });

    const result = transfer.start('/UNKNOWN.TXT', 0);
    transfer.handleNotification(packet(0, 1, 2, 3));
    expect(transfer.progress).toBe(0);
    transfer.handleNotification(packet(1));

    await result;
    expect(progress).toEqual([0, 1]);
  });

  it('caps progress at 1 when more bytes arrive than listed', async () => {
    const progress: number[] = [];
    const transfer = new FileTransfer({ channel, onProgress: (p) => progress.push(p) });

    const result = transfer.start('/GROWN.TXT', 2);
    transfer.handleNotification(packet(0, 1, 2, 3, 4));
    transfer.handleNotification(packet(1));

    await result;
    expect(progress).toEqual([0, 1, 1]);
  });

  it('ignores frames that are not data packets', () => {
    const transfer = new FileTransfer({ channel });

    void transfer.start('/A.TXT', 1);
    transfer.handleNotification(Uint8Array.of(0x05, 0x2f));

    expect(channel.writesTo(CRS_RX_UUID).length).toBe(1);
    expect(transfer.isActive).toBe(true);
    transfer.cancel();
  });

  it('rejects a second download while one is active', async () => {
    const transfer = new FileTransfer({ channel });

    const first = transfer.start('/ONE.TXT', 1);
    await expect(transfer.start('/TWO.TXT', 1)).rejects.toBeInstanceOf(TransferInProgressError);
    expect(transfer.currentPath).toBe('/ONE.TXT');

    transfer.handleNotification(packet(0, 9));
    transfer.handleNotification(packet(1));
    expect((await first).status).toBe('completed');
  });

  it('refuses to start without RX and TX bound', async () => {
    channel.bound.delete(CRS_TX_UUID);
    const transfer = new FileTransfer({ channel });

    await expect(transfer.start('/A.TXT', 1)).rejects.toBeInstanceOf(BLEConnectionError);
    expect(channel.writes).toEqual([]);
  });

  it('settles a cancelled download with the bytes received so far', async () => {
    const transfer = new FileTransfer({ channel });

    const result = transfer.start('/A.TXT', 10);
    transfer.handleNotification(packet(0, 9, 8));
    expect(transfer.cancel()).toBe(true);
    transfer.handleNotification(packet(1, 7));

    const outcome = await result;
    expect(outcome).toEqual({ status: 'cancelled', data: Uint8Array.of(9, 8) });
    expect(channel.writesTo(CRS_RX_UUID).slice(1)).toEqual([[0x12, 0], [0xff]]);
    expect(transfer.isActive).toBe(false);
  });

  it('sends cancel even when nothing is downloading', () => {
    const transfer = new FileTransfer({ channel });

    expect(transfer.cancel()).toBe(false);
    expect(channel.writesTo(CRS_RX_UUID)).toEqual([[0xff]]);
  });

  it('fails the download when the request cannot be written', async () => {
    channel.writeError = new Error('gatt down');
    const onError = vi.fn();
    const transfer = new FileTransfer({ channel, onError });

    const result = transfer.start('/A.TXT', 1);

    await expect(result).rejects.toThrow('File request failed: gatt down');
    expect(onError).toHaveBeenCalledTimes(1);
    expect(transfer.isActive).toBe(false);
  });

  it('reports a failed ack of the end marker after completing', async () => {
    const onError = vi.fn();
    const transfer = new FileTransfer({ channel, onError });

    const result = transfer.start('/A.TXT', 1);
    transfer.handleNotification(packet(0, 5));
    channel.writeError = new Error('gatt down');
    transfer.handleNotification(packet(1));

    const outcome = await result;
    expect(outcome).toEqual({ status: 'completed', data: Uint8Array.of(5) });
    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError.mock.calls[0][0]).toBeInstanceOf(BLEConnectionError);
    expect(onError.mock.calls[0][0].message).toBe('Failed to acknowledge packet 1: gatt down');
  });

  it('times out when no packet arrives', async () => {
    vi.useFakeTimers();
    const transfer = new FileTransfer({ channel, receiveTimeoutMs: 1000 });

    const outcome = transfer.start('/A.TXT', 4).catch((error: unknown) => error);
    vi.advanceTimersByTime(999);
    transfer.handleNotification(packet(0, 1, 2));
    vi.advanceTimersByTime(999);
    expect(transfer.isActive).toBe(true);
    vi.advanceTimersByTime(1);

    const error = await outcome;
    expect(error).toBeInstanceOf(BLETimeoutError);
    expect(error).toHaveProperty('message', 'No packet 1 within 1000ms');
    expect(transfer.isActive).toBe(false);
  });

  it('fails the active download from outside', async () => {
    const transfer = new FileTransfer({ channel });

    const result = transfer.start('/A.TXT', 1);
    transfer.fail(new BLEConnectionError('Disconnected'));

    await expect(result).rejects.toThrow('Disconnected');
  });
});

describe('computeProgress', () => {
  it('stays within [0, 1]', () => {
    expect(computeProgress(0, 0)).toBe(0);
    expect(computeProgress(50, 0)).toBe(0);
    expect(computeProgress(25, 100)).toBe(0.25);
    expect(computeProgress(150, 100)).toBe(1);
  });
});
