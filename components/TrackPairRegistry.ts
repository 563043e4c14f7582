// components/TrackPairRegistry.ts
import * as THREE from "three";
import { Track } from "./Track";
import { TrackPair } from "./TrackPair";
import { TrackOptions, TrackSetSaveData } from "./types";

// Ordered collection of track pairs; the host adds `root` to its scene
export class TrackPairRegistry {
  public readonly root = new THREE.Group();
  private pairs: TrackPair[] = [];

  constructor() {
    this.root.name = "Tracks";
  }

  get size(): number {
    return this.pairs.length;
  }

  get(index: number): TrackPair | undefined {
    return this.pairs[index];
  }

  all(): readonly TrackPair[] {
    return this.pairs;
  }

  indexOf(pair: TrackPair): number {
    return this.pairs.indexOf(pair);
  }

  add(pair: TrackPair): number {
    this.pairs.push(pair);
    this.root.add(pair.root);
    return this.pairs.length - 1;
  }

  remove(pair: TrackPair): boolean {
    const index = this.pairs.indexOf(pair);
    if (index < 0) {
      return false;
    }
    this.pairs.splice(index, 1);
    pair.dispose();
    return true;
  }

  clear(): void {
    this.pairs.forEach((pair) => pair.dispose());
    this.pairs = [];
  }

  advance(dt: number): void {
    this.pairs.forEach((pair) => pair.advance(dt));
  }

  toSaveData(): TrackSetSaveData {
    return {
      positionTracks: this.pairs.map((pair) => pair.position.toSaveState()),
      lookTracks: this.pairs.map((pair) => pair.look.toSaveState()),
    };
  }

  // Replaces every pair with the ones described by `data`, cursors at 0
  load(data: TrackSetSaveData, options: Partial<TrackOptions> = {}): void {
    this.clear();
    const count = Math.min(data.positionTracks.length, data.lookTracks.length);
    for (let i = 0; i < count; i++) {
      const pair = new TrackPair(
        Track.fromSaveState(data.positionTracks[i], options),
        Track.fromSaveState(data.lookTracks[i], options)
      );
      pair.refresh();
      this.add(pair);
    }
  }
}
