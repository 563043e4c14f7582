// firebase.ts
import { FirebaseOptions, getApps, initializeApp } from "firebase/app";
import {
  Firestore,
  getFirestore,
  collection,
  getDocs,
  getDoc,
  doc,
  setDoc,
  deleteDoc,
  DocumentData,
  QuerySnapshot,
} from "firebase/firestore";
import { DEFAULT_TRACK_COLLECTION } from "./config";
import { TrackStateFormatError } from "./saveState";
import { baseName, sortTrackPaths, TrackStore } from "./storage";

// Firestore rejects nested arrays, so the track set is stored as JSON text
export interface TrackStateDocument {
  contents: string;
  updatedAt: string;
}

export function connectFirestore(options: FirebaseOptions): Firestore {
  const existing = getApps().find((app) => app.name === "[DEFAULT]");
  const app = existing ?? initializeApp(options);
  return getFirestore(app);
}

export class FirestoreTrackStore implements TrackStore {
  private readonly db: Firestore;
  readonly collectionName: string;

  constructor(db: Firestore, collectionName: string = DEFAULT_TRACK_COLLECTION) {
    this.db = db;
    this.collectionName = collectionName;
  }

  async list(): Promise<string[]> {
    const snapshot: QuerySnapshot<DocumentData> = await getDocs(
      collection(this.db, this.collectionName)
    );
    return sortTrackPaths(snapshot.docs.map((d) => d.id)).map((id) =>
      this.pathFor(id)
    );
  }

  async read(filePath: string): Promise<string | undefined> {
    const snapshot = await getDoc(this.ref(filePath));
    if (!snapshot.exists()) {
      return undefined;
    }
    const contents: unknown = snapshot.data().contents;
    if (typeof contents !== "string") {
      throw new TrackStateFormatError("Document has no contents", `${filePath}.contents`);
    }
    return contents;
  }

  async write(filePath: string, contents: string): Promise<void> {
    const data: TrackStateDocument = {
      contents,
      updatedAt: new Date().toISOString(),
    };
    await setDoc(this.ref(filePath), data);
  }

  async remove(filePath: string): Promise<void> {
    await deleteDoc(this.ref(filePath));
  }

  pathFor(fileName: string): string {
    return `${this.collectionName}/${fileName}`;
  }

  private ref(filePath: string) {
    return doc(this.db, this.collectionName, baseName(filePath));
  }
}
