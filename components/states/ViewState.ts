// components/states/ViewState.ts
import * as THREE from "three";
import { logger } from "../logger";
import { BaseState, StateContext, StateId } from "./BaseState";

// Flies the view camera along one pair at a time; thumbstick up/down picks the pair
export class ViewState extends BaseState {
  private readonly camera: THREE.PerspectiveCamera;
  private entering = true;
  private pairIndex = 0;
  private cursor = 0;

  constructor(camera: THREE.PerspectiveCamera) {
    super(StateId.View, "Flythrough");
    this.camera = camera;
    this.camera.visible = false;
  }

  get currentPair(): number {
    return this.pairIndex;
  }

  get currentCursor(): number {
    return this.cursor;
  }

  detail(): string {
    return this.entering ? "" : `Track ${this.pairIndex + 1}`;
  }

  protected step(ctx: StateContext): number | undefined {
    const { registry } = ctx;
    if (registry.size === 0) {
      logger.info("There are no tracks to view");
      ctx.menu.highlight?.(StateId.Locomotion);
      return StateId.Locomotion;
    }

    if (this.entering) {
      this.entering = false;
      this.pairIndex = 0;
      this.cursor = registry.get(0)?.cursor ?? 0;
      this.camera.visible = true;
    } else {
      if (this.pairIndex >= registry.size) {
        this.pairIndex = 0;
      }
      const pair = registry.get(this.pairIndex);
      if (pair) {
        this.cursor += pair.position.speedAt(this.cursor) * ctx.dt;
      }
    }

    if (this.cursor > 1) {
      this.cursor = 0;
    }
    const current = registry.get(this.pairIndex);
    if (current) {
      const { position, look } = current.sample(this.cursor);
      this.camera.position.copy(position);
      this.camera.lookAt(look);
    }

    const hand = [ctx.dominant, ctx.recessive].find((h) => h.axisPressed && h.axis.y !== 0);
    if (hand) {
      const step = hand.axis.y > 0 ? 1 : -1;
      this.pairIndex = (this.pairIndex + step + registry.size) % registry.size;
      this.cursor = registry.get(this.pairIndex)?.cursor ?? 0;
    }
    return undefined;
  }

  protected exit(): void {
    this.camera.visible = false;
    this.entering = true;
  }
}
