// components/TrackPair.ts
import * as THREE from "three";
import { disposeObject } from "./disposal";
import { logger } from "./logger";
import { Track } from "./Track";
import { TrackRole } from "./types";

const FRUSTUM_LENGTH = 0.12;
const FRUSTUM_RADIUS = 0.06;
const RAY_LENGTH = 0.25;
const MARKER_COLOR = 0x00ffff;

export interface PairSample {
  position: THREE.Vector3;
  look: THREE.Vector3;
}

/**
 * A camera-position track and a look-target track that share one checkpoint
 * timeline, plus the looping playback cursor and its marker.
 *
 * Checkpoint edits must go through the pair so both tracks stay in step.
 */
export class TrackPair {
  public readonly root = new THREE.Group();
  public readonly position: Track;
  public readonly look: Track;
  public readonly frustum: THREE.Mesh;
  public readonly ray: THREE.ArrowHelper;
  public cursor = 0;

  constructor(position: Track, look: Track) {
    this.position = position;
    this.look = look;

    const geometry = new THREE.ConeGeometry(FRUSTUM_RADIUS, FRUSTUM_LENGTH, 4, 1, true);
    // apex at the origin, opening along +z so lookAt aims the open end
    geometry.rotateX(-Math.PI / 2);
    geometry.translate(0, 0, FRUSTUM_LENGTH / 2);
    this.frustum = new THREE.Mesh(
      geometry,
      new THREE.MeshBasicMaterial({ color: MARKER_COLOR, wireframe: true })
    );
    this.frustum.name = "Frustum";

    this.ray = new THREE.ArrowHelper(
      new THREE.Vector3(0, 0, 1),
      new THREE.Vector3(),
      RAY_LENGTH,
      MARKER_COLOR
    );
    this.ray.name = "Look Ray";

    this.root.name = "Track Pair";
    this.root.add(position.root, look.root, this.frustum, this.ray);
    this.updateMarker();
  }

  track(role: TrackRole): Track {
    return role === "position" ? this.position : this.look;
  }

  sample(t: number): PairSample {
    return {
      position: this.position.positionAt(t),
      look: this.look.positionAt(t),
    };
  }

  addCheckpoint(t: number): number {
    const index = this.position.addCheckpoint(t);
    this.look.addCheckpoint(t);
    this.verify("addCheckpoint");
    return index;
  }

  moveCheckpoint(index: number, t: number): number {
    const moved = this.position.moveCheckpoint(index, t);
    this.look.moveCheckpoint(index, t);
    this.verify("moveCheckpoint");
    return moved;
  }

  deleteCheckpoint(index: number): boolean {
    const removed = this.position.deleteCheckpoint(index);
    this.look.deleteCheckpoint(index);
    this.verify("deleteCheckpoint");
    return removed;
  }

  setCheckpointSpeed(index: number, speed: number): void {
    this.position.setCheckpointSpeed(index, speed);
    this.look.setCheckpointSpeed(index, speed);
  }

  adjustCheckpointSpeed(index: number, delta: number): void {
    const checkpoint = this.position.getCheckpoint(index);
    if (checkpoint) {
      this.setCheckpointSpeed(index, checkpoint.speed + delta);
    }
  }

  isSynchronized(): boolean {
    const a = this.position.getCheckpoints();
    const b = this.look.getCheckpoints();
    return a.length === b.length && a.every((c, i) => c.t === b[i].t);
  }

  // Loops the cursor back to 0 once it passes the end of the track
  advance(dt: number): void {
    this.cursor += this.position.speedAt(this.cursor) * dt;
    if (this.cursor > 1) {
      this.cursor = 0;
    }
    this.updateMarker();
  }

  updateMarker(): void {
    const { position, look } = this.sample(this.cursor);
    this.frustum.position.copy(position);
    this.frustum.lookAt(look);

    this.ray.position.copy(look);
    const direction = look.clone().sub(position);
    if (direction.lengthSq() > 0) {
      this.ray.setDirection(direction.normalize());
    }
  }

  refresh(): void {
    this.position.refresh();
    this.look.refresh();
    this.updateMarker();
  }

  dispose(): void {
    this.position.dispose();
    this.look.dispose();
    disposeObject(this.frustum);
    this.ray.dispose();
    this.root.clear();
    this.root.removeFromParent();
  }

  private verify(operation: string) {
    if (!this.isSynchronized()) {
      logger.error(`Track pair checkpoints diverged after ${operation}`);
    }
  }
}
