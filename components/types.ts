// components/types.ts
export type Vec3 = [number, number, number];

export interface TrackOptions {
  minSpeed: number;
  maxSpeed: number;
}

export interface Checkpoint {
  t: number;
  speed: number;
}

// One serialized track, as written to a track state file
export interface TrackSaveState {
  controlPointPositions: Vec3[];
  checkpointTValues: number[];
  checkpointSpeeds: number[];
}

export interface TrackSetSaveData {
  positionTracks: TrackSaveState[];
  lookTracks: TrackSaveState[];
}

export type TrackRole = "position" | "look";

export type FeedbackChannel = "state" | "detail";

export interface FeedbackSurface {
  setText: (channel: FeedbackChannel, text: string) => void;
}
