// components/saveState.ts
import { TrackSaveState, TrackSetSaveData, Vec3 } from "./types";

// Thrown when persisted track data does not have the expected shape
export class TrackStateFormatError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(field ? `${message} (at ${field})` : message);
    this.name = "TrackStateFormatError";
    this.field = field;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TrackStateFormatError("Expected a finite number", field);
  }
  return value;
}

function readArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new TrackStateFormatError("Expected an array", field);
  }
  return value;
}

function readPosition(value: unknown, field: string): Vec3 {
  const items = readArray(value, field);
  if (items.length !== 3) {
    throw new TrackStateFormatError("Expected [x, y, z]", field);
  }
  return [
    readNumber(items[0], `${field}[0]`),
    readNumber(items[1], `${field}[1]`),
    readNumber(items[2], `${field}[2]`),
  ];
}

export function parseTrackSaveState(value: unknown, field: string): TrackSaveState {
  if (!isRecord(value)) {
    throw new TrackStateFormatError("Expected a track object", field);
  }

  const positions = readArray(
    value.controlPointPositions,
    `${field}.controlPointPositions`
  ).map((p, i) => readPosition(p, `${field}.controlPointPositions[${i}]`));
  if (positions.length < 2) {
    throw new TrackStateFormatError(
      "A track needs at least two control points",
      `${field}.controlPointPositions`
    );
  }

  const tValues = readArray(
    value.checkpointTValues,
    `${field}.checkpointTValues`
  ).map((t, i) => {
    const n = readNumber(t, `${field}.checkpointTValues[${i}]`);
    if (n < 0 || n > 1) {
      throw new TrackStateFormatError(
        "Checkpoint t must lie in [0, 1]",
        `${field}.checkpointTValues[${i}]`
      );
    }
    return n;
  });

  const speeds = readArray(
    value.checkpointSpeeds,
    `${field}.checkpointSpeeds`
  ).map((s, i) => readNumber(s, `${field}.checkpointSpeeds[${i}]`));

  return {
    controlPointPositions: positions,
    checkpointTValues: tValues,
    checkpointSpeeds: speeds,
  };
}

export function parseTrackSetSaveData(text: string): TrackSetSaveData {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TrackStateFormatError(`Invalid JSON: ${reason}`, "");
  }
  if (!isRecord(raw)) {
    throw new TrackStateFormatError("Expected a track set object", "");
  }

  const positionTracks = readArray(raw.positionTracks, "positionTracks").map(
    (track, i) => parseTrackSaveState(track, `positionTracks[${i}]`)
  );
  const lookTracks = readArray(raw.lookTracks, "lookTracks").map((track, i) =>
    parseTrackSaveState(track, `lookTracks[${i}]`)
  );
  if (positionTracks.length !== lookTracks.length) {
    throw new TrackStateFormatError(
      `Found ${positionTracks.length} position tracks but ${lookTracks.length} look tracks`,
      "lookTracks"
    );
  }
  return { positionTracks, lookTracks };
}

export function serializeTrackSet(data: TrackSetSaveData): string {
  return JSON.stringify(data, null, 2);
}
