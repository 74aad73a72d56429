/**
 * Start pistol exchange.
 *
 * A start command puts the device into its countdown; the device later
 * notifies the exact start time on the result characteristic. Results are
 * only accepted while counting, so stale or duplicate notifications are
 * dropped.
 */

import {
  BLEConnectionError,
  FlySightError,
  StartCancelledError,
  toConnectionError,
} from '../exceptions';
import { StartState, type StartStatus } from '../models/start';
import { buildStartCancelCommand, buildStartCommand } from '../protocol/commands';
import { START_CONTROL_UUID } from '../protocol/constants';
import { parseStartResult } from '../protocol/responses';
import type { Deferred, ExchangeChannel } from './channel';

export interface StartControlOptions {
  channel: ExchangeChannel;

  onChange?: (status: StartStatus) => void;

  onError?: (error: FlySightError) => void;
}

export class StartControl {
  private _state = StartState.IDLE;
  private _resultDate: Date | null = null;
  private waiters: Deferred<Date>[] = [];

  constructor(private readonly options: StartControlOptions) {}

  get state(): StartState {
    return this._state;
  }

  get resultDate(): Date | null {
    return this._resultDate;
  }

  /**
   * Send the start command and enter the counting state.
   *
   * @throws {BLEConnectionError} If the control characteristic is not bound or the write fails
   */
  async sendStart(): Promise<void> {
    this.ensureControl();

    this.setState(StartState.COUNTING);
    try {
      await this.options.channel.write(START_CONTROL_UUID, buildStartCommand(), true);
    } catch (error) {
      const failure = toConnectionError('Start command failed', error);
      if (this._state === StartState.COUNTING) {
        this.setState(StartState.IDLE);
      }
      this.rejectWaiters(failure);
      this.options.onError?.(failure);
      throw failure;
    }
  }

  /**
   * Send the cancel command and return to idle.
   *
   * Pending {@link waitForResult} calls reject with StartCancelledError.
   *
   * @throws {BLEConnectionError} If the control characteristic is not bound or the write fails
   */
  async sendCancel(): Promise<void> {
    this.ensureControl();

    this.setState(StartState.IDLE);
    this.rejectWaiters(new StartCancelledError('Start cancelled'));
    try {
      await this.options.channel.write(START_CONTROL_UUID, buildStartCancelCommand(), true);
    } catch (error) {
      const failure = toConnectionError('Cancel command failed', error);
      this.options.onError?.(failure);
      throw failure;
    }
  }

  /**
   * Wait for the next accepted start result.
   */
  waitForResult(): Promise<Date> {
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Handle a notification from the start result characteristic.
   *
   * @returns The accepted start time, or null if the frame was invalid or not expected
   */
  handleNotification(data: Uint8Array): Date | null {
    const date = parseStartResult(data);
    if (!date) {
      console.debug(`Invalid start result (${data.length} bytes)`);
      return null;
    }

    if (this._state !== StartState.COUNTING) {
      console.debug(`Ignoring start result ${date.toISOString()} while idle`);
      return null;
    }

    this._resultDate = date;
    this.setState(StartState.IDLE);

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve(date);
    }
    return date;
  }

  /**
   * Return to idle after the link is lost.
   */
  reset(error: FlySightError): void {
    this.rejectWaiters(error);
    if (this._state !== StartState.IDLE) {
      this.setState(StartState.IDLE);
    }
  }

  private ensureControl(): void {
    if (!this.options.channel.isBound(START_CONTROL_UUID)) {
      throw new BLEConnectionError('Control characteristic not found');
    }
  }

  private setState(state: StartState): void {
    this._state = state;
    this.options.onChange?.({ state, resultDate: this._resultDate });
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
