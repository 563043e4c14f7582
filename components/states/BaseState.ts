// components/states/BaseState.ts
import { HandSnapshot } from "../input";
import { MenuSelector } from "../RadialMenu";
import { TrackPairRegistry } from "../TrackPairRegistry";

export const StateId = {
  Base: -1,
  Locomotion: 0,
  Creation: 1,
  Edit: 2,
  View: 3,
  File: 4,
} as const;

export type StateId = (typeof StateId)[keyof typeof StateId];

export interface StateContext {
  dominant: HandSnapshot;
  recessive: HandSnapshot;
  registry: TrackPairRegistry;
  menu: MenuSelector;
  dt: number;
}

/**
 * One interaction mode. `update` runs the mode for a tick and returns the id
 * of the state that should run next; returning `id` means stay.
 *
 * On its own the class is the inert Base state: it only listens for the menu.
 */
export class BaseState {
  readonly id: number;
  readonly label: string;

  constructor(id: number = StateId.Base, label = "") {
    this.id = id;
    this.label = label;
  }

  update(ctx: StateContext): number {
    const redirect = this.step(ctx);
    const next = redirect ?? this.requestedState(ctx);
    if (next !== this.id) {
      this.exit(ctx);
    }
    return next;
  }

  // Text for the detail feedback channel
  detail(): string {
    return "";
  }

  // Per-tick work; may return a state id to leave immediately
  protected step(_ctx: StateContext): number | undefined {
    return undefined;
  }

  protected exit(_ctx: StateContext): void {}

  private requestedState(ctx: StateContext): number {
    const { recessive, menu } = ctx;
    if (recessive.axisPressed && !recessive.buttons.grip) {
      const selected = menu.selectFromDirection(recessive.axis);
      menu.highlight?.(selected);
      return selected;
    }
    return this.id;
  }
}
