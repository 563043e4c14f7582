// components/states/CreationState.ts
import * as THREE from "three";
import { clearGroup } from "../disposal";
import { Track } from "../Track";
import { TrackPair } from "../TrackPair";
import { TrackOptions } from "../types";
import { BaseState, StateContext, StateId } from "./BaseState";

const PLACEMENT_RADIUS = 0.02;
const POSITION_COLOR = 0xffffff;
const LOOK_COLOR = 0x00ffff;

/**
 * Four trigger presses make a pair: the first two are the camera path's
 * endpoints and the last two the look path's.
 */
export class CreationState extends BaseState {
  public readonly markers = new THREE.Group();
  private readonly trackOptions: Partial<TrackOptions>;
  private placements: THREE.Vector3[] = [];

  constructor(trackOptions: Partial<TrackOptions> = {}) {
    super(StateId.Creation, "Create");
    this.trackOptions = trackOptions;
    this.markers.name = "Placements";
  }

  get placementCount(): number {
    return this.placements.length;
  }

  detail(): string {
    return this.placements.length < 2 ? "Camera path" : "Look path";
  }

  protected step(ctx: StateContext): number | undefined {
    for (const hand of [ctx.dominant, ctx.recessive]) {
      if (hand.pressed.trigger) {
        this.place(hand.probe, ctx);
      }
    }
    return undefined;
  }

  protected exit(): void {
    this.reset();
  }

  private place(position: THREE.Vector3, ctx: StateContext) {
    this.placements.push(position.clone());
    const marker = new THREE.Mesh(
      new THREE.SphereGeometry(PLACEMENT_RADIUS, 12, 8),
      new THREE.MeshBasicMaterial({
        color: this.placements.length <= 2 ? POSITION_COLOR : LOOK_COLOR,
      })
    );
    marker.position.copy(position);
    this.markers.add(marker);

    if (this.placements.length === 4) {
      const [a, b, c, d] = this.placements;
      const pair = new TrackPair(
        new Track(a, b, this.trackOptions),
        new Track(c, d, this.trackOptions)
      );
      pair.refresh();
      ctx.registry.add(pair);
      this.reset();
    }
  }

  private reset() {
    clearGroup(this.markers);
    this.placements = [];
  }
}
