// components/directoryStore.ts
// Node-only; not re-exported from index.ts
import { mkdir, readFile, readdir, rm, writeFile } from "fs/promises";
import path from "path";
import { StoreConfig } from "./config";
import { connectFirestore, FirestoreTrackStore } from "./firebase";
import { sortTrackPaths, TrackStore } from "./storage";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DirectoryTrackStore implements TrackStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async list(): Promise<string[]> {
    try {
      const names = await readdir(this.directory);
      return sortTrackPaths(names).map((name) => this.pathFor(name));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  async read(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async write(filePath: string, contents: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, contents, "utf8");
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { force: true });
  }

  pathFor(fileName: string): string {
    return path.join(this.directory, fileName);
  }
}

export function createTrackStore(store: StoreConfig): TrackStore {
  switch (store.kind) {
    case "directory":
      return new DirectoryTrackStore(store.directory);
    case "firestore":
      return new FirestoreTrackStore(connectFirestore(store.firebase), store.collection);
  }
}
