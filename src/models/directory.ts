/**
 * Remote directory listing structures.
 */

/**
 * FAT attribute bits reported for each directory entry.
 */
export enum FileAttribute {
  READ_ONLY = 0x01,
  HIDDEN = 0x02,
  SYSTEM = 0x04,
  ARCHIVE = 0x08,
  DIRECTORY = 0x10,
}

/**
 * One entry of a remote directory listing.
 */
export interface DirectoryEntry {
  /** File or folder name (8.3, never empty) */
  name: string;

  /** File size in bytes */
  size: number;

  /** Last modification time (UTC, 2-second resolution) */
  date: Date;

  /** Attribute letters in `rhsad` order, `-` for clear bits */
  attributes: string;

  /** Raw attribute byte */
  flags: number;

  /** True when the directory attribute bit is set */
  isFolder: boolean;
}

/**
 * Order entries folders first, then by case-insensitive name.
 */
export function compareDirectoryEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.isFolder !== b.isFolder) {
    return a.isFolder ? -1 : 1;
  }
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Sort a listing in place and return it.
 */
export function sortDirectoryEntries(entries: DirectoryEntry[]): DirectoryEntry[] {
  return entries.sort(compareDirectoryEntries);
}

/**
 * Serialize path segments to the absolute path the device expects.
 */
export function formatPath(segments: readonly string[]): string {
  return '/' + segments.join('/');
}

/**
 * Last component of a slash-separated path.
 */
export function leafName(path: string): string {
  const parts = path.split('/').filter((part) => part.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : '';
}
