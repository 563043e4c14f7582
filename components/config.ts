// components/config.ts
import { FirebaseOptions } from "firebase/app";
import { Vec3 } from "./types";

export interface InteractionSettings {
  minSpeed: number;
  maxSpeed: number;
  selectionRadius: number;
  speedSensitivity: number;
  castSensitivity: number;
  heightOffset: Vec3;
}

export type StoreConfig =
  | { kind: "directory"; directory: string }
  | { kind: "firestore"; collection: string; firebase: FirebaseOptions };

export interface DollyConfig extends InteractionSettings {
  store: StoreConfig;
}

export const DEFAULT_SETTINGS: InteractionSettings = {
  minSpeed: 0.01,
  maxSpeed: 0.3,
  selectionRadius: 0.075,
  speedSensitivity: 0.3,
  castSensitivity: 2,
  heightOffset: [0, 0, 0],
};

export const DEFAULT_STORE_DIRECTORY = "./track-states";
export const DEFAULT_TRACK_COLLECTION = "track_states";

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readVector(env: Env, name: string, fallback: Vec3): Vec3 {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parts = raw.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 3 || !parts.every((p) => Number.isFinite(p))) {
    throw new Error(`${name} must look like "x,y,z", got "${raw}"`);
  }
  return [parts[0], parts[1], parts[2]];
}

function readStore(env: Env): StoreConfig {
  const kind = env.DOLLY_STORE ?? "directory";
  if (kind === "directory") {
    return {
      kind,
      directory: env.DOLLY_STORE_DIR ?? DEFAULT_STORE_DIRECTORY,
    };
  }
  if (kind === "firestore") {
    if (!env.FIREBASE_PROJECT_ID) {
      throw new Error("FIREBASE_PROJECT_ID is required when DOLLY_STORE=firestore");
    }
    return {
      kind,
      collection: env.DOLLY_FIRESTORE_COLLECTION ?? DEFAULT_TRACK_COLLECTION,
      firebase: {
        apiKey: env.FIREBASE_API_KEY,
        authDomain: env.FIREBASE_AUTH_DOMAIN,
        projectId: env.FIREBASE_PROJECT_ID,
        storageBucket: env.FIREBASE_STORAGE_BUCKET,
        messagingSenderId: env.FIREBASE_MESSAGING_SENDER_ID,
        appId: env.FIREBASE_APP_ID,
      },
    };
  }
  throw new Error(`DOLLY_STORE must be "directory" or "firestore", got "${kind}"`);
}

export function loadConfig(env: Env = process.env): DollyConfig {
  const minSpeed = readNumber(env, "DOLLY_MIN_SPEED", DEFAULT_SETTINGS.minSpeed);
  const maxSpeed = readNumber(env, "DOLLY_MAX_SPEED", DEFAULT_SETTINGS.maxSpeed);
  if (!(minSpeed > 0 && maxSpeed > minSpeed)) {
    throw new Error(
      `DOLLY_MIN_SPEED and DOLLY_MAX_SPEED must satisfy 0 < min < max, got ${minSpeed} and ${maxSpeed}`
    );
  }

  return {
    minSpeed,
    maxSpeed,
    selectionRadius: readNumber(env, "DOLLY_SELECTION_RADIUS", DEFAULT_SETTINGS.selectionRadius),
    speedSensitivity: readNumber(env, "DOLLY_SPEED_SENSITIVITY", DEFAULT_SETTINGS.speedSensitivity),
    castSensitivity: readNumber(env, "DOLLY_CAST_SENSITIVITY", DEFAULT_SETTINGS.castSensitivity),
    heightOffset: readVector(env, "DOLLY_HEIGHT_OFFSET", DEFAULT_SETTINGS.heightOffset),
    store: readStore(env),
  };
}
