// components/Track.ts
import * as THREE from "three";
import { clearGroup, disposeObject } from "./disposal";
import { Checkpoint, TrackOptions, TrackSaveState, Vec3 } from "./types";

export const DEFAULT_TRACK_OPTIONS: TrackOptions = {
  minSpeed: 0.01,
  maxSpeed: 0.3,
};

// closestParameter samples t = i / SAMPLE_STEPS
const SAMPLE_STEPS = 100;

// Interior checkpoints never reach the endpoints
const CHECKPOINT_MIN_T = 0.01;
const CHECKPOINT_MAX_T = 0.99;

// Curve segments are built from simulated playback, one line per second
const PLAYBACK_STEP = 1 / 30;
const STEPS_PER_SEGMENT = 30;

const CONTROL_POINT_RADIUS = 0.02;
const CHECKPOINT_RADIUS = 0.015;
const INTERIOR_POINT_COLOR = new THREE.Color(0, 0, 1);
const LINK_COLOR = new THREE.Color(1, 1, 1);

const WHITE = new THREE.Color(1, 1, 1);
const YELLOW = new THREE.Color(1, 1, 0);
const ORANGE = new THREE.Color(1, 0.647, 0);
const RED = new THREE.Color(1, 0, 0);

/**
 * Maps a speed fraction in [0, 1] onto the white → yellow → orange → red ramp.
 * Fractions outside that range come back black.
 */
export function speedColor(
  fraction: number,
  target: THREE.Color = new THREE.Color()
): THREE.Color {
  if (!(fraction >= 0 && fraction <= 1)) {
    return target.setRGB(0, 0, 0);
  }
  if (fraction < 0.33) {
    return target.copy(WHITE).lerp(YELLOW, fraction / 0.33);
  }
  if (fraction < 0.66) {
    return target.copy(YELLOW).lerp(ORANGE, (fraction - 0.33) / 0.33);
  }
  return target.copy(ORANGE).lerp(RED, (fraction - 0.66) / 0.34);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function toVector(position: Vec3 | undefined): THREE.Vector3 {
  return position
    ? new THREE.Vector3(position[0], position[1], position[2])
    : new THREE.Vector3();
}

/**
 * A Bezier path over an ordered list of control points, with a sorted list of
 * checkpoints that assign playback speeds along the curve parameter.
 *
 * Mutators only change the model. Call `refresh()` to rebuild the three.js
 * visuals under `root` once a batch of edits is done.
 */
export class Track {
  public readonly root = new THREE.Group();
  public readonly controlPointMarkers = new THREE.Group();
  public readonly curveSegments = new THREE.Group();
  public readonly checkpointMarkers = new THREE.Group();
  public readonly minSpeed: number;
  public readonly maxSpeed: number;

  private controlPoints: THREE.Vector3[];
  private checkpoints: Checkpoint[];
  private links: THREE.Line | null = null;

  constructor(
    start: THREE.Vector3 = new THREE.Vector3(),
    end: THREE.Vector3 = new THREE.Vector3(),
    options: Partial<TrackOptions> = {}
  ) {
    const { minSpeed, maxSpeed } = { ...DEFAULT_TRACK_OPTIONS, ...options };
    if (!(minSpeed > 0 && maxSpeed > minSpeed)) {
      throw new RangeError(
        `Invalid speed range [${minSpeed}, ${maxSpeed}]: expected 0 < min < max`
      );
    }
    this.minSpeed = minSpeed;
    this.maxSpeed = maxSpeed;

    this.controlPoints = [start.clone(), end.clone()];
    this.checkpoints = [
      { t: 0, speed: this.defaultSpeed },
      { t: 1, speed: this.defaultSpeed },
    ];

    this.root.name = "Track";
    this.controlPointMarkers.name = "Control Points";
    this.curveSegments.name = "Curve";
    this.checkpointMarkers.name = "Checkpoints";
    this.root.add(
      this.controlPointMarkers,
      this.curveSegments,
      this.checkpointMarkers
    );
  }

  /**
   * Rebuilds a track from persisted data. Control points keep their stored
   * order, interior checkpoints are re-added by t, and stored speeds are
   * applied by index (clamped into the speed range). Missing speeds keep the
   * default.
   */
  static fromSaveState(
    state: TrackSaveState,
    options: Partial<TrackOptions> = {}
  ): Track {
    const positions = state.controlPointPositions;
    const track = new Track(
      toVector(positions[0]),
      toVector(positions[positions.length - 1]),
      options
    );
    if (positions.length >= 2) {
      track.controlPoints = positions.map((p) => toVector(p));
    }

    for (let i = 1; i < state.checkpointTValues.length - 1; i++) {
      track.addCheckpoint(state.checkpointTValues[i]);
    }
    state.checkpointSpeeds.forEach((speed, i) => {
      track.setCheckpointSpeed(i, speed);
    });
    return track;
  }

  get defaultSpeed(): number {
    return (this.minSpeed + this.maxSpeed) / 2;
  }

  get controlPointCount(): number {
    return this.controlPoints.length;
  }

  get checkpointCount(): number {
    return this.checkpoints.length;
  }

  controlPointAt(index: number): THREE.Vector3 | undefined {
    return this.controlPoints[index]?.clone();
  }

  getControlPoints(): THREE.Vector3[] {
    return this.controlPoints.map((p) => p.clone());
  }

  getCheckpoint(index: number): Checkpoint | undefined {
    const checkpoint = this.checkpoints[index];
    return checkpoint ? { ...checkpoint } : undefined;
  }

  getCheckpoints(): Checkpoint[] {
    return this.checkpoints.map((c) => ({ ...c }));
  }

  checkpointPosition(index: number): THREE.Vector3 | undefined {
    const checkpoint = this.checkpoints[index];
    return checkpoint ? this.positionAt(checkpoint.t) : undefined;
  }

  speedFraction(speed: number): number {
    return (speed - this.minSpeed) / (this.maxSpeed - this.minSpeed);
  }

  // De Casteljau over every control point; the zero vector outside [0, 1]
  positionAt(t: number): THREE.Vector3 {
    if (!(t >= 0 && t <= 1)) {
      return new THREE.Vector3();
    }
    const points = this.controlPoints.map((p) => p.clone());
    for (let round = 1; round < points.length; round++) {
      for (let i = 0; i < points.length - round; i++) {
        points[i].lerp(points[i + 1], t);
      }
    }
    return points[0];
  }

  closestParameter(target: THREE.Vector3): number {
    let best = 0;
    let bestDistance = Infinity;
    for (let i = 0; i <= SAMPLE_STEPS; i++) {
      const t = i / SAMPLE_STEPS;
      const distance = this.positionAt(t).distanceTo(target);
      if (distance < bestDistance) {
        bestDistance = distance;
        best = t;
      }
    }
    return best;
  }

  /**
   * Inserts an interior control point next to the existing point nearest to
   * `position`, on the side of its closer neighbor. Returns the new index.
   */
  addControlPoint(position: THREE.Vector3): number {
    let nearest = 0;
    let nearestDistance = Infinity;
    this.controlPoints.forEach((p, i) => {
      const distance = p.distanceTo(position);
      if (distance < nearestDistance) {
        nearestDistance = distance;
        nearest = i;
      }
    });

    const last = this.controlPoints.length - 1;
    let index: number;
    if (nearest === 0) {
      index = 1;
    } else if (nearest === last) {
      index = last;
    } else {
      const left = this.controlPoints[nearest - 1].distanceTo(position);
      const right = this.controlPoints[nearest + 1].distanceTo(position);
      index = left < right ? nearest : nearest + 1;
    }

    this.controlPoints.splice(index, 0, position.clone());
    return index;
  }

  deleteControlPoint(index: number): boolean {
    if (!this.isInterior(index, this.controlPoints.length)) {
      return false;
    }
    this.controlPoints.splice(index, 1);
    return true;
  }

  moveControlPoint(index: number, position: THREE.Vector3): void {
    const point = this.controlPoints[index];
    if (point) {
      point.copy(position);
    }
  }

  addCheckpoint(t: number): number {
    if (!Number.isFinite(t)) {
      return -1;
    }
    const clamped = clamp(t, 0, 1);
    const after = this.checkpoints.filter((c) => c.t <= clamped).length;
    const index = clamp(after, 1, this.checkpoints.length - 1);
    this.checkpoints.splice(index, 0, {
      t: clamped,
      speed: this.defaultSpeed,
    });
    return index;
  }

  deleteCheckpoint(index: number): boolean {
    if (!this.isInterior(index, this.checkpoints.length)) {
      return false;
    }
    this.checkpoints.splice(index, 1);
    return true;
  }

  // Returns the checkpoint's new index; endpoints stay put, unknown indices give -1
  moveCheckpoint(index: number, newT: number): number {
    const last = this.checkpoints.length - 1;
    if (index === 0 || index === last) {
      return index;
    }
    if (!this.isInterior(index, this.checkpoints.length)) {
      return -1;
    }
    if (!Number.isFinite(newT)) {
      return index;
    }

    const [moved] = this.checkpoints.splice(index, 1);
    const t = clamp(newT, CHECKPOINT_MIN_T, CHECKPOINT_MAX_T);
    const target = this.checkpoints.filter((c) => c.t <= t).length;
    this.checkpoints.splice(target, 0, { t, speed: moved.speed });
    return target;
  }

  speedAt(t: number): number {
    const clamped = Number.isFinite(t) ? clamp(t, 0, 1) : 0;
    let i = 0;
    for (let j = 0; j < this.checkpoints.length; j++) {
      if (this.checkpoints[j].t <= clamped) {
        i = j;
      }
    }
    const current = this.checkpoints[i];
    const next = this.checkpoints[i + 1];
    if (!next) {
      return current.speed;
    }
    const fraction = (clamped - current.t) / (next.t - current.t);
    return current.speed + (next.speed - current.speed) * fraction;
  }

  setCheckpointSpeed(index: number, speed: number): void {
    const checkpoint = this.checkpoints[index];
    if (checkpoint && Number.isFinite(speed)) {
      checkpoint.speed = clamp(speed, this.minSpeed, this.maxSpeed);
    }
  }

  get linksVisible(): boolean {
    return this.links?.visible ?? false;
  }

  get segmentCount(): number {
    return this.curveSegments.children.length;
  }

  setVisible(visible: boolean): void {
    this.root.visible = visible;
  }

  // Rebuilds markers, control point links, speed-colored curve segments and checkpoint markers
  refresh(): void {
    this.buildControlPointMarkers();
    this.buildLinks();
    this.buildCurveSegments();
    this.buildCheckpointMarkers();
  }

  toSaveState(): TrackSaveState {
    return {
      controlPointPositions: this.controlPoints.map((p): Vec3 => [p.x, p.y, p.z]),
      checkpointTValues: this.checkpoints.map((c) => c.t),
      checkpointSpeeds: this.checkpoints.map((c) => c.speed),
    };
  }

  dispose(): void {
    clearGroup(this.controlPointMarkers);
    clearGroup(this.curveSegments);
    clearGroup(this.checkpointMarkers);
    if (this.links) {
      disposeObject(this.links);
      this.root.remove(this.links);
      this.links = null;
    }
    this.root.removeFromParent();
  }

  private isInterior(index: number, length: number): boolean {
    return Number.isInteger(index) && index > 0 && index < length - 1;
  }

  private buildControlPointMarkers() {
    clearGroup(this.controlPointMarkers);
    const last = this.controlPoints.length - 1;
    const endpointColor = speedColor(0.5);
    this.controlPoints.forEach((point, i) => {
      const isEndpoint = i === 0 || i === last;
      const mesh = new THREE.Mesh(
        new THREE.SphereGeometry(CONTROL_POINT_RADIUS, 12, 8),
        new THREE.MeshBasicMaterial({
          color: isEndpoint ? endpointColor : INTERIOR_POINT_COLOR,
        })
      );
      mesh.name = i === 0 ? "Start Point" : i === last ? "End Point" : "Control Point";
      mesh.position.copy(point);
      this.controlPointMarkers.add(mesh);
    });
  }

  private buildLinks() {
    if (this.links) {
      disposeObject(this.links);
      this.root.remove(this.links);
    }
    this.links = new THREE.Line(
      new THREE.BufferGeometry().setFromPoints(this.controlPoints),
      new THREE.LineBasicMaterial({ color: LINK_COLOR })
    );
    this.links.name = "Control Point Links";
    this.links.visible = this.controlPoints.length > 2;
    this.root.add(this.links);
  }

  private buildCurveSegments() {
    clearGroup(this.curveSegments);

    let t = 0;
    let points = [this.positionAt(0)];
    let colors = [speedColor(this.speedFraction(this.speedAt(0)))];
    let steps = 0;

    while (t < 1) {
      t = Math.min(1, t + this.speedAt(t) * PLAYBACK_STEP);
      steps++;
      points.push(this.positionAt(t));
      colors.push(speedColor(this.speedFraction(this.speedAt(t))));

      if (steps === STEPS_PER_SEGMENT || t >= 1) {
        this.curveSegments.add(this.buildSegment(points, colors));
        points = [points[points.length - 1].clone()];
        colors = [colors[colors.length - 1].clone()];
        steps = 0;
      }
    }
  }

  private buildSegment(points: THREE.Vector3[], colors: THREE.Color[]): THREE.Line {
    const geometry = new THREE.BufferGeometry().setFromPoints(points);
    const rgb: number[] = [];
    colors.forEach((c) => rgb.push(c.r, c.g, c.b));
    geometry.setAttribute("color", new THREE.Float32BufferAttribute(rgb, 3));
    const line = new THREE.Line(
      geometry,
      new THREE.LineBasicMaterial({ vertexColors: true })
    );
    line.name = `Curve Segment ${this.curveSegments.children.length}`;
    return line;
  }

  private buildCheckpointMarkers() {
    clearGroup(this.checkpointMarkers);
    this.checkpoints.forEach((checkpoint, i) => {
      const mesh = new THREE.Mesh(
        new THREE.SphereGeometry(CHECKPOINT_RADIUS, 10, 6),
        new THREE.MeshBasicMaterial({
          color: speedColor(this.speedFraction(checkpoint.speed)),
        })
      );
      mesh.name = `Checkpoint ${i}`;
      mesh.position.copy(this.positionAt(checkpoint.t));
      this.checkpointMarkers.add(mesh);
    });
  }
}
