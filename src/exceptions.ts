/**
 * Exception classes for the FlySight BLE library.
 */

export class FlySightError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlySightError';
  }
}

export class BLEConnectionError extends FlySightError {
  constructor(message: string) {
    super(message);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends FlySightError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

export class ProtocolError extends FlySightError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * Raised when a download is requested while another one still owns the
 * TX notification handler.
 */
export class TransferInProgressError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'TransferInProgressError';
  }
}

export class StartCancelledError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'StartCancelledError';
  }
}

/**
 * Wrap an unknown rejection from the transport into a library error.
 */
export function toConnectionError(context: string, error: unknown): FlySightError {
  if (error instanceof FlySightError) {
    return error;
  }
  if (error instanceof Error) {
    return new BLEConnectionError(`${context}: ${error.message}`);
  }
  return new BLEConnectionError(context);
}
