// components/states/LocomotionState.ts
import * as THREE from "three";
import { Hand } from "../input";
import { BaseState, StateContext, StateId } from "./BaseState";

export interface LocomotionOptions {
  rig: THREE.Object3D;
  marker: THREE.Object3D;
  castSensitivity: number;
  heightOffset: THREE.Vector3;
}

// Teleport by holding a trigger to cast a marker forward, releasing to jump there
export class LocomotionState extends BaseState {
  private readonly rig: THREE.Object3D;
  private readonly marker: THREE.Object3D;
  private readonly castSensitivity: number;
  private readonly heightOffset: THREE.Vector3;
  private caster: Hand | null = null;
  private distance = 0;

  constructor(options: LocomotionOptions) {
    super(StateId.Locomotion, "Teleport");
    this.rig = options.rig;
    this.marker = options.marker;
    this.castSensitivity = options.castSensitivity;
    this.heightOffset = options.heightOffset.clone();
    this.marker.visible = false;
  }

  get castingHand(): Hand | null {
    return this.caster;
  }

  get castDistance(): number {
    return this.distance;
  }

  protected step(ctx: StateContext): number | undefined {
    if (this.caster) {
      const hand = ctx[this.caster];
      if (hand.buttons.trigger) {
        this.distance += this.castSensitivity * ctx.dt;
        this.marker.position
          .copy(hand.controllerPosition)
          .addScaledVector(hand.pointer, this.distance)
          .sub(this.heightOffset);
      } else {
        this.rig.position.copy(this.marker.position);
        this.cancel();
      }
    } else if (ctx.dominant.buttons.trigger) {
      this.begin("dominant");
    } else if (ctx.recessive.buttons.trigger) {
      this.begin("recessive");
    }
    return undefined;
  }

  protected exit(): void {
    this.cancel();
  }

  private begin(hand: Hand) {
    this.caster = hand;
    this.marker.visible = true;
  }

  private cancel() {
    this.caster = null;
    this.distance = 0;
    this.marker.visible = false;
  }
}
