/**
 * BLE protocol constants for FlySight devices.
 */

// Characteristics share the vendor base UUID and differ in the first 32 bits
export const GNSS_PV_UUID = '00000000-8e22-4541-9d4c-21edae82ed19';
export const CRS_TX_UUID = '00000001-8e22-4541-9d4c-21edae82ed19';
export const CRS_RX_UUID = '00000002-8e22-4541-9d4c-21edae82ed19';
export const START_CONTROL_UUID = '00000003-8e22-4541-9d4c-21edae82ed19';
export const START_RESULT_UUID = '00000004-8e22-4541-9d4c-21edae82ed19';

export const CHARACTERISTIC_UUIDS = [
  GNSS_PV_UUID,
  CRS_TX_UUID,
  CRS_RX_UUID,
  START_CONTROL_UUID,
  START_RESULT_UUID,
] as const;

export type CharacteristicUuid = (typeof CHARACTERISTIC_UUIDS)[number];

/** Bluetooth SIG company identifier advertised by FlySight devices. */
export const MANUFACTURER_ID = 0x09db;

// Manufacturer data must carry the company id plus at least one payload byte
export const MIN_MANUFACTURER_DATA_LENGTH = 3;

// Fixed frame sizes
export const DIRECTORY_ENTRY_LENGTH = 24;
export const DIRECTORY_NAME_LENGTH = 13;
export const START_RESULT_LENGTH = 9;

/**
 * Command and packet codes carried on the CRS RX/TX characteristics.
 */
export enum CommandCode {
  FILE_READ = 0x02,
  DIRECTORY_READ = 0x05,
  FILE_DATA = 0x10,
  FILE_ACK = 0x12,
  CANCEL = 0xff,
}

/**
 * Commands written to the start control characteristic.
 */
export enum StartCommand {
  START = 0x00,
  CANCEL = 0x01,
}
