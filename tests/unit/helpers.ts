import * as THREE from "three";
import { createHandSnapshot, HandSnapshot, HandSnapshotInit } from "../../components/input";
import { RadialMenu } from "../../components/RadialMenu";
import { STATE_LABELS } from "../../components/StateManager";
import { StateContext } from "../../components/states/BaseState";
import { Track } from "../../components/Track";
import { TrackPair } from "../../components/TrackPair";
import { TrackPairRegistry } from "../../components/TrackPairRegistry";

export const vec = (x: number, y: number, z: number) => new THREE.Vector3(x, y, z);

export function hand(init: HandSnapshotInit = {}): HandSnapshot {
  return createHandSnapshot(init);
}

// Straight position path along x at y = 0, look path along x at y = 1
export function straightPair(offset = 0): TrackPair {
  const pair = new TrackPair(
    new Track(vec(0, 0, offset), vec(1, 0, offset)),
    new Track(vec(0, 1, offset), vec(1, 1, offset))
  );
  pair.refresh();
  return pair;
}

export function makeContext(
  registry: TrackPairRegistry,
  init: Partial<Omit<StateContext, "registry">> = {}
): StateContext {
  return {
    dominant: init.dominant ?? hand(),
    recessive: init.recessive ?? hand(),
    registry,
    menu: init.menu ?? new RadialMenu(STATE_LABELS),
    dt: init.dt ?? 0,
  };
}

// Thumbstick flick the menu reads as the given sector
export const MENU_DIRECTIONS = {
  locomotion: new THREE.Vector2(0, 1),
  creation: new THREE.Vector2(1, 0),
  edit: new THREE.Vector2(0.6, -0.8),
  view: new THREE.Vector2(-0.1, -1),
  file: new THREE.Vector2(-1, 0),
};

export function menuFlick(direction: THREE.Vector2, init: HandSnapshotInit = {}): HandSnapshot {
  return hand({ ...init, axis: direction.clone(), axisPressed: true });
}
