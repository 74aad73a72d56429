/**
 * BLE notification parsing.
 *
 * Parsers return null for frames that do not match their layout: the TX
 * characteristic is shared by several exchanges, so a mismatch is expected
 * and not an error.
 */

import type { DirectoryEntry } from '../models/directory';
import { FileAttribute } from '../models/directory';
import {
  CommandCode,
  DIRECTORY_ENTRY_LENGTH,
  DIRECTORY_NAME_LENGTH,
  MIN_MANUFACTURER_DATA_LENGTH,
  START_RESULT_LENGTH,
} from './constants';
import { decodeFatDateTime, encodeFatDateTime, utcDateFromFields } from './fat-time';

const ATTRIBUTE_LETTERS: ReadonlyArray<[FileAttribute, string]> = [
  [FileAttribute.READ_ONLY, 'r'],
  [FileAttribute.HIDDEN, 'h'],
  [FileAttribute.SYSTEM, 's'],
  [FileAttribute.ARCHIVE, 'a'],
  [FileAttribute.DIRECTORY, 'd'],
];

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const textEncoder = new TextEncoder();

/**
 * A data packet received on the TX characteristic during a download.
 */
export interface FileDataPacket {
  packetNumber: number;

  /** Payload bytes; empty marks the end of the file */
  payload: Uint8Array;
}

/**
 * Decode a fixed-length NUL-padded UTF-8 field.
 *
 * @returns Text before the first NUL, or null if empty or not valid UTF-8
 */
export function decodeNullPaddedString(data: Uint8Array): string | null {
  const end = data.indexOf(0);
  const bytes = end === -1 ? data : data.subarray(0, end);

  let text: string;
  try {
    text = strictDecoder.decode(bytes);
  } catch {
    return null;
  }

  return text.length > 0 ? text : null;
}

/**
 * Render attribute bits as `rhsad` letters, `-` for clear bits.
 *
 * @example formatAttributes(0x11) === 'r---d'
 */
export function formatAttributes(flags: number): string {
  return ATTRIBUTE_LETTERS.map(([bit, letter]) => (flags & bit ? letter : '-')).join('');
}

/**
 * Parse one directory entry notification.
 *
 * Format (24 bytes):
 *   [reserved:2][size:4][date:2][time:2][attrib:1][name:13]
 *
 * @returns DirectoryEntry, or null if length, name or date/time are invalid
 */
export function parseDirectoryEntry(data: Uint8Array): DirectoryEntry | null {
  if (data.length !== DIRECTORY_ENTRY_LENGTH) {
    return null;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const size = view.getUint32(2, true);
  const fdate = view.getUint16(6, true);
  const ftime = view.getUint16(8, true);
  const flags = view.getUint8(10);

  const name = decodeNullPaddedString(data.subarray(11, 11 + DIRECTORY_NAME_LENGTH));
  if (name === null) {
    return null;
  }

  const date = decodeFatDateTime(fdate, ftime);
  if (date === null) {
    return null;
  }

  return {
    name,
    size,
    date,
    attributes: formatAttributes(flags),
    flags,
    isFolder: (flags & FileAttribute.DIRECTORY) !== 0,
  };
}

/**
 * Encode a directory entry notification, as the device sends it.
 *
 * @throws {RangeError} If the name does not fit in 13 bytes or the date is out of range
 */
export function encodeDirectoryEntry(
  entry: Pick<DirectoryEntry, 'name' | 'size' | 'date' | 'flags'>
): Uint8Array {
  const nameBytes = textEncoder.encode(entry.name);
  if (nameBytes.length > DIRECTORY_NAME_LENGTH) {
    throw new RangeError(
      `Name "${entry.name}" is ${nameBytes.length} bytes (max ${DIRECTORY_NAME_LENGTH})`
    );
  }

  const packed = encodeFatDateTime(entry.date);
  const buffer = new ArrayBuffer(DIRECTORY_ENTRY_LENGTH);
  const view = new DataView(buffer);
  view.setUint32(2, entry.size, true);
  view.setUint16(6, packed.date, true);
  view.setUint16(8, packed.time, true);
  view.setUint8(10, entry.flags);

  const result = new Uint8Array(buffer);
  result.set(nameBytes, 11);
  return result;
}

/**
 * Parse a start result notification.
 *
 * Format (9 bytes):
 *   [year:2][month:1][day:1][hour:1][minute:1][second:1][millisecond:2]
 *
 * @returns Start time in UTC, or null if length or fields are invalid
 */
export function parseStartResult(data: Uint8Array): Date | null {
  if (data.length !== START_RESULT_LENGTH) {
    return null;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return utcDateFromFields(
    view.getUint16(0, true),
    view.getUint8(2),
    view.getUint8(3),
    view.getUint8(4),
    view.getUint8(5),
    view.getUint8(6),
    view.getUint16(7, true)
  );
}

/**
 * Parse a file data packet.
 *
 * Format: [0x10][packet:1][payload:variable]
 *
 * @returns FileDataPacket, or null if the frame is not a data packet
 */
export function parseFileDataPacket(data: Uint8Array): FileDataPacket | null {
  if (data.length < 2 || data[0] !== CommandCode.FILE_DATA) {
    return null;
  }

  return {
    packetNumber: data[1],
    payload: data.subarray(2),
  };
}

/**
 * Read the company identifier from raw advertisement manufacturer data.
 *
 * @param data - Manufacturer data including the 2-byte little-endian company id
 * @returns Company id, or null if the data is too short
 */
export function readManufacturerId(data: Uint8Array | undefined): number | null {
  if (!data || data.length < MIN_MANUFACTURER_DATA_LENGTH) {
    return null;
  }
  return data[0] | (data[1] << 8);
}
