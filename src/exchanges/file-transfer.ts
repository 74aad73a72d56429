/**
 * Stop-and-wait file download over the CRS RX/TX characteristics.
 *
 * The device sends numbered 0x10 data packets on TX and waits for a 0x12
 * acknowledgment on RX before sending the next one. Packet numbers are
 * 8-bit and wrap. A packet with no payload marks the end of the file.
 *
 * Out-of-order packets are dropped without acknowledgment and no NACK is
 * sent: recovery relies on the device resending the unacknowledged packet.
 * An optional receive timeout fails a stalled transfer.
 */

import {
  BLEConnectionError,
  BLETimeoutError,
  FlySightError,
  TransferInProgressError,
  toConnectionError,
} from '../exceptions';
import {
  buildAckCommand,
  buildCancelCommand,
  buildFileReadCommand,
} from '../protocol/commands';
import { CRS_RX_UUID, CRS_TX_UUID } from '../protocol/constants';
import { parseFileDataPacket } from '../protocol/responses';
import type { Deferred, ExchangeChannel } from './channel';

/**
 * Outcome of a download that was not aborted by an error.
 *
 * A cancelled transfer carries the bytes received before cancellation.
 */
export type TransferResult =
  | { status: 'completed'; data: Uint8Array }
  | { status: 'cancelled'; data: Uint8Array };

export interface FileTransferOptions {
  channel: ExchangeChannel;

  /** Called with a value in [0, 1] after every accepted packet */
  onProgress?: (progress: number) => void;

  onError?: (error: FlySightError) => void;

  /**
   * Fail the transfer when no in-order packet arrives within this delay.
   * Unset means wait forever.
   */
  receiveTimeoutMs?: number;
}

interface TransferSession {
  path: string;
  expectedSize: number;
  chunks: Uint8Array[];
  receivedBytes: number;
  nextPacketNumber: number;
  progress: number;
  deferred: Deferred<TransferResult>;
  timeoutId: ReturnType<typeof setTimeout> | null;
}

/**
 * Compute download progress, defined as 0 while the size is unknown.
 */
export function computeProgress(receivedBytes: number, expectedSize: number): number {
  if (expectedSize <= 0) {
    return 0;
  }
  return Math.min(1, receivedBytes / expectedSize);
}

export class FileTransfer {
  private session: TransferSession | null = null;

  constructor(private readonly options: FileTransferOptions) {}

  get isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Progress of the active transfer, 0 when idle.
   */
  get progress(): number {
    return this.session?.progress ?? 0;
  }

  get currentPath(): string | null {
    return this.session?.path ?? null;
  }

  /**
   * Start downloading a file.
   *
   * @param path - Absolute path of the file on the device
   * @param expectedSize - Size from the directory listing, 0 if unknown
   * @returns Promise settled when the file completes, fails or is cancelled
   * @throws {TransferInProgressError} If another download is active
   * @throws {BLEConnectionError} If RX or TX is not bound
   */
  start(path: string, expectedSize: number): Promise<TransferResult> {
    if (this.session) {
      return Promise.reject(
        new TransferInProgressError(
          `Download of ${this.session.path} is still in progress`
        )
      );
    }

    const { channel } = this.options;
    if (!channel.isBound(CRS_RX_UUID) || !channel.isBound(CRS_TX_UUID)) {
      return Promise.reject(
        new BLEConnectionError('No connected peripheral or RX/TX characteristic')
      );
    }

    return new Promise<TransferResult>((resolve, reject) => {
      const session: TransferSession = {
        path,
        expectedSize,
        chunks: [],
        receivedBytes: 0,
        nextPacketNumber: 0,
        progress: 0,
        deferred: { resolve, reject },
        timeoutId: null,
      };
      this.session = session;
      this.armTimeout();
      this.options.onProgress?.(0);

      console.log(`Getting file ${path} (expected ${expectedSize} bytes)`);

      void channel.setNotify(CRS_TX_UUID, true).catch((error: unknown) => {
        this.failSession(session, toConnectionError('Failed to enable TX notifications', error));
      });
      void channel
        .write(CRS_RX_UUID, buildFileReadCommand(path, 0, 0), false)
        .catch((error: unknown) => {
          this.failSession(session, toConnectionError('File request failed', error));
        });
    });
  }

  /**
   * Handle a TX notification while a download is active.
   */
  handleNotification(data: Uint8Array): void {
    const session = this.session;
    if (!session) {
      return;
    }

    const packet = parseFileDataPacket(data);
    if (!packet) {
      return;
    }

    if (packet.packetNumber !== session.nextPacketNumber) {
      console.debug(
        `Out of order packet: ${packet.packetNumber} (expected ${session.nextPacketNumber})`
      );
      return;
    }

    const isLast = packet.payload.length === 0;
    if (!isLast) {
      session.chunks.push(packet.payload.slice());
      session.receivedBytes += packet.payload.length;
      const progress = computeProgress(session.receivedBytes, session.expectedSize);
      if (progress > session.progress) {
        session.progress = progress;
        this.options.onProgress?.(progress);
      }
    }

    session.nextPacketNumber = (session.nextPacketNumber + 1) & 0xff;

    void this.options.channel
      .write(CRS_RX_UUID, buildAckCommand(packet.packetNumber), false)
      .catch((error: unknown) => {
        this.failSession(
          session,
          toConnectionError(`Failed to acknowledge packet ${packet.packetNumber}`, error)
        );
      });

    console.debug(`Received packet: ${packet.packetNumber}, length ${packet.payload.length}`);

    if (isLast) {
      console.log(`File ${session.path} complete (${session.receivedBytes} bytes)`);
      session.progress = 1;
      this.options.onProgress?.(1);
      this.settle(session, { status: 'completed', data: concatChunks(session) });
    } else {
      this.armTimeout();
    }
  }

  /**
   * Ask the device to stop sending and settle the active download as cancelled.
   *
   * The cancel command is sent even when no download is active.
   *
   * @returns True if an active download was cancelled
   */
  cancel(): boolean {
    if (this.options.channel.isBound(CRS_RX_UUID)) {
      void this.options.channel
        .write(CRS_RX_UUID, buildCancelCommand(), false)
        .catch((error: unknown) => {
          this.options.onError?.(toConnectionError('Cancel command failed', error));
        });
    } else {
      console.warn('RX characteristic not found');
    }

    const session = this.session;
    if (!session) {
      return false;
    }

    console.log(`Cancelled download of ${session.path}`);
    this.settle(session, { status: 'cancelled', data: concatChunks(session) });
    return true;
  }

  /**
   * Abort the active download with an error.
   */
  fail(error: FlySightError): void {
    if (this.session) {
      this.failSession(this.session, error);
    }
  }

  private failSession(session: TransferSession, error: FlySightError): void {
    // Already settled, e.g. the ack of the end marker failed
    if (this.session !== session) {
      this.options.onError?.(error);
      return;
    }
    console.warn(`Download of ${session.path} failed: ${error.message}`);
    this.detach(session);
    this.options.onError?.(error);
    session.deferred.reject(error);
  }

  private settle(session: TransferSession, result: TransferResult): void {
    this.detach(session);
    session.deferred.resolve(result);
  }

  private detach(session: TransferSession): void {
    if (session.timeoutId !== null) {
      clearTimeout(session.timeoutId);
      session.timeoutId = null;
    }
    this.session = null;

    if (this.options.channel.isBound(CRS_TX_UUID)) {
      void this.options.channel.setNotify(CRS_TX_UUID, false).catch((error: unknown) => {
        this.options.onError?.(toConnectionError('Failed to disable TX notifications', error));
      });
    }
  }

  private armTimeout(): void {
    const session = this.session;
    const timeoutMs = this.options.receiveTimeoutMs;
    if (!session || timeoutMs === undefined) {
      return;
    }
    if (session.timeoutId !== null) {
      clearTimeout(session.timeoutId);
    }
    session.timeoutId = setTimeout(() => {
      session.timeoutId = null;
      this.failSession(
        session,
        new BLETimeoutError(`No packet ${session.nextPacketNumber} within ${timeoutMs}ms`)
      );
    }, timeoutMs);
  }
}

function concatChunks(session: TransferSession): Uint8Array {
  const data = new Uint8Array(session.receivedBytes);
  let offset = 0;
  for (const chunk of session.chunks) {
    data.set(chunk, offset);
    offset += chunk.length;
  }
  return data;
}
