/**
 * Discovered peripheral records.
 */

/**
 * Registry view of a FlySight seen during scanning or bonded earlier.
 */
export interface PeripheralInfo {
  /** Stable transport identifier */
  id: string;

  /** Advertised name, "Unnamed Device" if none */
  name: string;

  /** Last received signal strength (dBm) */
  rssi: number;

  isConnected: boolean;

  isBonded: boolean;
}

export const UNNAMED_DEVICE = 'Unnamed Device';
