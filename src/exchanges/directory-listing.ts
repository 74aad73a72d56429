/**
 * Remote directory listing over the CRS RX/TX characteristics.
 *
 * A request is a single 0x05 command; the device answers with one
 * notification per entry. There is no end-of-listing marker, so the
 * awaiting flag clears on the first notification after a request and only
 * guards against overlapping requests.
 */

import { BLETimeoutError, FlySightError, toConnectionError } from '../exceptions';
import {
  type DirectoryEntry,
  formatPath,
  sortDirectoryEntries,
} from '../models/directory';
import { buildDirectoryCommand } from '../protocol/commands';
import { CRS_RX_UUID } from '../protocol/constants';
import { parseDirectoryEntry } from '../protocol/responses';
import type { Deferred, ExchangeChannel } from './channel';

/**
 * Listing snapshot published on every change.
 */
export interface DirectoryState {
  path: string[];
  entries: DirectoryEntry[];
  isAwaitingResponse: boolean;
}

export interface DirectoryListingOptions {
  channel: ExchangeChannel;

  onChange?: (state: DirectoryState) => void;

  onError?: (error: FlySightError) => void;

  /**
   * Clear the awaiting flag if no notification arrives within this delay.
   * Unset means wait forever.
   */
  listingTimeoutMs?: number;
}

export class DirectoryListing {
  private _path: string[] = [];
  private _entries: DirectoryEntry[] = [];
  private _isAwaitingResponse = false;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private waiters: Deferred<DirectoryEntry[]>[] = [];

  constructor(private readonly options: DirectoryListingOptions) {}

  get path(): readonly string[] {
    return this._path;
  }

  get entries(): readonly DirectoryEntry[] {
    return this._entries;
  }

  get isAwaitingResponse(): boolean {
    return this._isAwaitingResponse;
  }

  /**
   * Enter a subdirectory of the current path.
   *
   * @returns False if a request is still awaiting its response
   */
  changeDirectory(name: string): boolean {
    if (this._isAwaitingResponse) {
      return false;
    }
    this._path.push(name);
    this.load();
    return true;
  }

  /**
   * Go to the parent directory.
   *
   * @returns False if a request is awaiting its response or already at root
   */
  goUp(): boolean {
    if (this._isAwaitingResponse || this._path.length === 0) {
      return false;
    }
    this._path.pop();
    this.load();
    return true;
  }

  /**
   * List the current directory again.
   */
  refresh(): boolean {
    if (this._isAwaitingResponse) {
      return false;
    }
    this.load();
    return true;
  }

  /**
   * Issue a listing request for the current path.
   */
  load(): void {
    this._entries = [];
    this._isAwaitingResponse = true;
    this.armTimeout();
    this.publish();

    const directory = formatPath(this._path);
    console.log(`Getting directory ${directory}`);

    void this.options.channel
      .write(CRS_RX_UUID, buildDirectoryCommand(directory), false)
      .catch((error: unknown) => {
        this.fail(toConnectionError('Directory request failed', error));
      });
  }

  /**
   * Wait until the outstanding request has been answered.
   *
   * Resolves immediately when nothing is outstanding.
   */
  settled(): Promise<DirectoryEntry[]> {
    if (!this._isAwaitingResponse) {
      return Promise.resolve([...this._entries]);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Handle a TX notification.
   *
   * @returns The decoded entry, or null if the frame is not a directory entry
   */
  handleNotification(data: Uint8Array): DirectoryEntry | null {
    const entry = parseDirectoryEntry(data);
    if (entry) {
      this._entries.push(entry);
      sortDirectoryEntries(this._entries);
    }

    if (this._isAwaitingResponse) {
      this._isAwaitingResponse = false;
      this.disarmTimeout();
      this.resolveWaiters();
    }
    this.publish();

    return entry;
  }

  /**
   * Abort the outstanding request after a transport error.
   */
  fail(error: FlySightError): void {
    const wasAwaiting = this._isAwaitingResponse;
    this._isAwaitingResponse = false;
    this.disarmTimeout();
    this.rejectWaiters(error);
    if (wasAwaiting) {
      this.publish();
      this.options.onError?.(error);
    }
  }

  /**
   * Return to the root with an empty listing.
   */
  reset(error: FlySightError): void {
    this._path = [];
    this._entries = [];
    this._isAwaitingResponse = false;
    this.disarmTimeout();
    this.rejectWaiters(error);
    this.publish();
  }

  /**
   * Find an entry of the current listing by exact name.
   */
  findEntry(name: string): DirectoryEntry | undefined {
    return this._entries.find((entry) => entry.name === name);
  }

  private armTimeout(): void {
    this.disarmTimeout();
    const timeoutMs = this.options.listingTimeoutMs;
    if (timeoutMs === undefined) {
      return;
    }
    this.timeoutId = setTimeout(() => {
      this.timeoutId = null;
      this.fail(
        new BLETimeoutError(`No directory response within ${timeoutMs}ms`)
      );
    }, timeoutMs);
  }

  private disarmTimeout(): void {
    if (this.timeoutId !== null) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
  }

  private resolveWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve([...this._entries]);
    }
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private publish(): void {
    this.options.onChange?.({
      path: [...this._path],
      entries: [...this._entries],
      isAwaitingResponse: this._isAwaitingResponse,
    });
  }
}
