// components/states/EditState.ts
import * as THREE from "three";
import { Hand, HandSnapshot } from "../input";
import { TrackPair } from "../TrackPair";
import { TrackPairRegistry } from "../TrackPairRegistry";
import { TrackRole } from "../types";
import { BaseState, StateContext, StateId } from "./BaseState";

export type SelectionKind = "control" | "checkpoint";

// What one hand is holding
export interface Selection {
  pair: TrackPair;
  role: TrackRole;
  kind: SelectionKind;
  index: number;
}

export interface EditOptions {
  selectionRadius: number;
  speedSensitivity: number;
}

const HANDS: readonly Hand[] = ["dominant", "recessive"];

function otherHand(hand: Hand): Hand {
  return hand === "dominant" ? "recessive" : "dominant";
}

function samePoint(a: Selection, b: Selection): boolean {
  return a.pair === b.pair && a.role === b.role && a.kind === b.kind && a.index === b.index;
}

/**
 * Grab and reshape tracks. Trigger grabs control points (dragged with the
 * probe), grip grabs checkpoints on camera paths (slid along the curve, speed
 * set with the thumbstick). Each point has at most one owner: grabbing a
 * point takes it from the other hand.
 */
export class EditState extends BaseState {
  private readonly selectionRadius: number;
  private readonly speedSensitivity: number;
  private selections: Record<Hand, Selection | null> = {
    dominant: null,
    recessive: null,
  };

  constructor(options: EditOptions) {
    super(StateId.Edit, "Edit");
    this.selectionRadius = options.selectionRadius;
    this.speedSensitivity = options.speedSensitivity;
  }

  selection(hand: Hand): Selection | null {
    const held = this.selections[hand];
    return held ? { ...held } : null;
  }

  detail(): string {
    const held = this.selections.dominant ?? this.selections.recessive;
    if (!held) {
      return "";
    }
    const what = held.kind === "control" ? "Control point" : "Checkpoint";
    return `${what} ${held.index}`;
  }

  protected step(ctx: StateContext): number | undefined {
    for (const hand of HANDS) {
      this.updateHand(hand, ctx);
    }
    this.dominantActions(ctx.dominant);
    this.recessiveActions(ctx.recessive, ctx.registry);
    return undefined;
  }

  protected exit(): void {
    this.selections = { dominant: null, recessive: null };
  }

  // Last grab wins: a point held by the other hand is taken from it
  private grab(hand: Hand, selection: Selection) {
    const other = otherHand(hand);
    const held = this.selections[other];
    if (held && samePoint(held, selection)) {
      this.selections[other] = null;
    }
    this.selections[hand] = selection;
  }

  private updateHand(hand: Hand, ctx: StateContext) {
    const input = ctx[hand];
    let held = this.selections[hand];
    if (!held) {
      const found = input.buttons.trigger
        ? this.findControlPoint(input.probe, ctx.registry)
        : input.buttons.grip
          ? this.findCheckpoint(input.probe, ctx.registry)
          : null;
      if (!found) {
        return;
      }
      this.grab(hand, found);
      held = found;
    }

    if (held.kind === "control") {
      if (!input.buttons.trigger) {
        this.selections[hand] = null;
        return;
      }
      const track = held.pair.track(held.role);
      track.moveControlPoint(held.index, input.probe);
      track.refresh();
      held.pair.updateMarker();
      return;
    }

    if (!input.buttons.grip) {
      this.selections[hand] = null;
      return;
    }
    const { pair } = held;
    const from = held.index;
    const to = pair.moveCheckpoint(from, pair.position.closestParameter(input.probe));
    if (to >= 0 && to !== from) {
      this.reindex(pair, "checkpoint", null, (i) => {
        if (i === from) return to;
        const shifted = i > from ? i - 1 : i;
        return shifted >= to ? shifted + 1 : shifted;
      });
    }
    if (input.axis.y !== 0) {
      const index = to >= 0 ? to : from;
      pair.adjustCheckpointSpeed(index, input.axis.y * this.speedSensitivity * ctx.dt);
    }
    pair.refresh();
  }

  private dominantActions(input: HandSnapshot) {
    const held = this.selections.dominant;
    if (!held) {
      return;
    }

    if (input.pressed.primary) {
      const track = held.pair.track(held.role);
      const last = track.controlPointCount - 1;
      const a = track.controlPointAt(last - 1);
      const b = track.controlPointAt(last);
      if (a && b) {
        const index = track.addControlPoint(a.lerp(b, 0.5));
        this.reindex(held.pair, "control", held.role, (i) => (i >= index ? i + 1 : i));
        track.refresh();
      }
    }

    if (input.pressed.secondary && held.role === "position") {
      const index = held.pair.addCheckpoint(0.5);
      if (index >= 0) {
        this.reindex(held.pair, "checkpoint", null, (i) => (i >= index ? i + 1 : i));
      }
      held.pair.refresh();
    }
  }

  private recessiveActions(input: HandSnapshot, registry: TrackPairRegistry) {
    let held = this.selections.recessive;
    if (held && input.pressed.primary) {
      const { pair, index } = held;
      const removed =
        held.kind === "checkpoint"
          ? pair.deleteCheckpoint(index)
          : pair.track(held.role).deleteControlPoint(index);
      this.selections.recessive = null;
      if (removed) {
        this.reindex(pair, held.kind, held.kind === "checkpoint" ? null : held.role, (i) =>
          i === index ? -1 : i > index ? i - 1 : i
        );
      }
      pair.refresh();
      held = null;
    }

    if (held && input.pressed.secondary) {
      const { pair } = held;
      registry.remove(pair);
      for (const hand of HANDS) {
        if (this.selections[hand]?.pair === pair) {
          this.selections[hand] = null;
        }
      }
    }
  }

  // Rewrites held indices on `pair` after a structural edit; -1 drops the selection
  private reindex(
    pair: TrackPair,
    kind: SelectionKind,
    role: TrackRole | null,
    map: (index: number) => number
  ) {
    for (const hand of HANDS) {
      const held = this.selections[hand];
      if (held && held.pair === pair && held.kind === kind && (role === null || held.role === role)) {
        const index = map(held.index);
        this.selections[hand] = index < 0 ? null : { ...held, index };
      }
    }
  }

  private findControlPoint(probe: THREE.Vector3, registry: TrackPairRegistry): Selection | null {
    for (const role of ["position", "look"] as const) {
      for (const pair of registry.all()) {
        const points = pair.track(role).getControlPoints();
        const index = points.findIndex((p) => p.distanceTo(probe) < this.selectionRadius);
        if (index >= 0) {
          return { pair, role, kind: "control", index };
        }
      }
    }
    return null;
  }

  private findCheckpoint(probe: THREE.Vector3, registry: TrackPairRegistry): Selection | null {
    for (const pair of registry.all()) {
      for (let index = 0; index < pair.position.checkpointCount; index++) {
        const position = pair.position.checkpointPosition(index);
        if (position && position.distanceTo(probe) < this.selectionRadius) {
          return { pair, role: "position", kind: "checkpoint", index };
        }
      }
    }
    return null;
  }
}
