// components/storage.ts
export const NEW_FILE_SLOT = "<save to new file>";

const TRACK_FILE_PATTERN = /^track_state_(\d+)\.json$/;

/**
 * Where track sets are kept. Paths come from `list()` or `pathFor()` and are
 * opaque to callers.
 */
export interface TrackStore {
  // Paths of every track_state_<n>.json entry, ordered by n
  list: () => Promise<string[]>;
  // Undefined when nothing is stored under `path`
  read: (path: string) => Promise<string | undefined>;
  write: (path: string, contents: string) => Promise<void>;
  remove: (path: string) => Promise<void>;
  pathFor: (fileName: string) => string;
}

// Last segment of a path with either separator
export function baseName(filePath: string): string {
  return filePath.slice(Math.max(filePath.lastIndexOf("/"), filePath.lastIndexOf("\\")) + 1);
}

export function trackFileNumber(filePath: string): number | undefined {
  const match = TRACK_FILE_PATTERN.exec(baseName(filePath));
  return match ? Number(match[1]) : undefined;
}

export function trackFileName(n: number): string {
  return `track_state_${n}.json`;
}

export function nextTrackFileName(existing: readonly string[]): string {
  const highest = existing.reduce((max, p) => Math.max(max, trackFileNumber(p) ?? 0), 0);
  return trackFileName(highest + 1);
}

// Keeps only track state entries, ordered by their number
export function sortTrackPaths(paths: readonly string[]): string[] {
  return paths
    .filter((p) => trackFileNumber(p) !== undefined)
    .sort((a, b) => (trackFileNumber(a) ?? 0) - (trackFileNumber(b) ?? 0));
}

// Keeps track sets in a Map; for headless hosts and tests
export class InMemoryTrackStore implements TrackStore {
  readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    Object.entries(initial).forEach(([name, contents]) => {
      this.files.set(name, contents);
    });
  }

  async list(): Promise<string[]> {
    return sortTrackPaths([...this.files.keys()]);
  }

  async read(filePath: string): Promise<string | undefined> {
    return this.files.get(filePath);
  }

  async write(filePath: string, contents: string): Promise<void> {
    this.files.set(filePath, contents);
  }

  async remove(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }

  pathFor(fileName: string): string {
    return fileName;
  }
}
