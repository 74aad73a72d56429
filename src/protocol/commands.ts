/**
 * BLE protocol command builders for FlySight devices.
 */

import { CommandCode, StartCommand } from './constants';

const textEncoder = new TextEncoder();

/**
 * Build command to list a remote directory.
 *
 * @param path - Absolute path, e.g. "/" or "/TRACKS"
 * @returns Command bytes: 0x05 + UTF-8 path
 */
export function buildDirectoryCommand(path: string): Uint8Array {
  const pathBytes = textEncoder.encode(path);
  const result = new Uint8Array(1 + pathBytes.length);
  result[0] = CommandCode.DIRECTORY_READ;
  result.set(pathBytes, 1);
  return result;
}

/**
 * Build command to start a file download.
 *
 * @param path - Absolute path of the file
 * @param offset - First packet to send (0 = beginning)
 * @param stride - Packet stride (0 = every packet)
 * @returns Command bytes
 *
 * Format:
 *   [cmd:1][offset:4][stride:4][path:variable]
 *   - cmd: 0x02
 *   - offset, stride: little-endian uint32
 *   - path: UTF-8, no terminator
 */
export function buildFileReadCommand(
  path: string,
  offset: number = 0,
  stride: number = 0
): Uint8Array {
  const pathBytes = textEncoder.encode(path);
  const buffer = new ArrayBuffer(9 + pathBytes.length);
  const view = new DataView(buffer);
  view.setUint8(0, CommandCode.FILE_READ);
  view.setUint32(1, offset, true);
  view.setUint32(5, stride, true);

  const result = new Uint8Array(buffer);
  result.set(pathBytes, 9);
  return result;
}

/**
 * Build acknowledgment for a received data packet.
 *
 * @param packetNumber - Packet number being acknowledged (0-255)
 * @returns Command bytes: 0x12 + packet number
 */
export function buildAckCommand(packetNumber: number): Uint8Array {
  return Uint8Array.of(CommandCode.FILE_ACK, packetNumber & 0xff);
}

/**
 * Build command to abort the running file transfer.
 *
 * @returns Command bytes: 0xFF
 */
export function buildCancelCommand(): Uint8Array {
  return Uint8Array.of(CommandCode.CANCEL);
}

export function buildStartCommand(): Uint8Array {
  return Uint8Array.of(StartCommand.START);
}

export function buildStartCancelCommand(): Uint8Array {
  return Uint8Array.of(StartCommand.CANCEL);
}
