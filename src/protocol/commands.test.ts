import { describe, expect, it } from 'vitest';
import {
  buildAckCommand,
  buildCancelCommand,
  buildDirectoryCommand,
  buildFileReadCommand,
  buildStartCancelCommand,
  buildStartCommand,
} from './commands';

describe('buildDirectoryCommand', () => {
  it('prefixes the path with the directory opcode', () => {
    expect(Array.from(buildDirectoryCommand('/'))).toEqual([0x05, 0x2f]);
    expect(Array.from(buildDirectoryCommand('/LOG'))).toEqual([0x05, 0x2f, 0x4c, 0x4f, 0x47]);
  });
});

describe('buildFileReadCommand', () => {
  it('defaults offset and stride to zero', () => {
    expect(Array.from(buildFileReadCommand('/A'))).toEqual([
      0x02, 0, 0, 0, 0, 0, 0, 0, 0, 0x2f, 0x41,
    ]);
  });

  it('writes offset and stride little-endian', () => {
    expect(Array.from(buildFileReadCommand('/X', 1, 0x01020304))).toEqual([
      0x02, 1, 0, 0, 0, 4, 3, 2, 1, 0x2f, 0x58,
    ]);
  });
});

describe('buildAckCommand', () => {
  it('acknowledges the packet number modulo 256', () => {
    expect(Array.from(buildAckCommand(7))).toEqual([0x12, 7]);
    expect(Array.from(buildAckCommand(255))).toEqual([0x12, 255]);
    expect(Array.from(buildAckCommand(256))).toEqual([0x12, 0]);
  });
});

describe('single-byte commands', () => {
  it('encodes cancel and the start pistol commands', () => {
    expect(Array.from(buildCancelCommand())).toEqual([0xff]);
    expect(Array.from(buildStartCommand())).toEqual([0x00]);
    expect(Array.from(buildStartCancelCommand())).toEqual([0x01]);
  });
});
