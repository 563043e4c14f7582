import * as THREE from "three";
import { StateId } from "../../components/states/BaseState";
import { LocomotionState } from "../../components/states/LocomotionState";
import { TrackPairRegistry } from "../../components/TrackPairRegistry";
import { hand, makeContext, MENU_DIRECTIONS, menuFlick, vec } from "./helpers";

function setup() {
  const rig = new THREE.Object3D();
  const marker = new THREE.Object3D();
  const state = new LocomotionState({
    rig,
    marker,
    castSensitivity: 2,
    heightOffset: vec(0, 1, 0),
  });
  return { rig, marker, state, registry: new TrackPairRegistry() };
}

const casting = () =>
  hand({
    buttons: { trigger: true },
    controllerPosition: vec(0, 1, 0),
    pointer: vec(0, 0, -1),
  });

describe("LocomotionState", () => {
  test("casts forward while the trigger is held and teleports on release", () => {
    const { rig, marker, state, registry } = setup();

    expect(state.update(makeContext(registry, { dominant: casting(), dt: 0.5 }))).toBe(
      StateId.Locomotion
    );
    expect(state.castingHand).toBe("dominant");
    expect(marker.visible).toBe(true);
    expect(state.castDistance).toBe(0);

    state.update(makeContext(registry, { dominant: casting(), dt: 0.5 }));
    expect(marker.position.toArray()).toEqual([0, 0, -1]);

    state.update(makeContext(registry, { dominant: casting(), dt: 0.5 }));
    expect(marker.position.toArray()).toEqual([0, 0, -2]);

    state.update(makeContext(registry, { dt: 0.5 }));
    expect(rig.position.toArray()).toEqual([0, 0, -2]);
    expect(marker.visible).toBe(false);
    expect(state.castDistance).toBe(0);
    expect(state.castingHand).toBeNull();
  });

  test("ignores the other hand while a cast is active", () => {
    const { state, registry } = setup();
    state.update(makeContext(registry, { dominant: casting(), recessive: casting() }));
    expect(state.castingHand).toBe("dominant");

    state.update(makeContext(registry, { recessive: casting() }));
    expect(state.castingHand).toBeNull();

    state.update(makeContext(registry, { recessive: casting() }));
    expect(state.castingHand).toBe("recessive");
  });

  test("leaving mid-cast cancels without teleporting", () => {
    const { rig, marker, state, registry } = setup();
    state.update(makeContext(registry, { dominant: casting(), dt: 0.5 }));
    state.update(makeContext(registry, { dominant: casting(), dt: 0.5 }));

    const next = state.update(
      makeContext(registry, {
        dominant: casting(),
        recessive: menuFlick(MENU_DIRECTIONS.creation),
        dt: 0.5,
      })
    );
    expect(next).toBe(StateId.Creation);
    expect(state.castingHand).toBeNull();
    expect(marker.visible).toBe(false);
    expect(rig.position.toArray()).toEqual([0, 0, 0]);
  });

  test("a menu flick with the grip held is not a transition", () => {
    const { state, registry } = setup();
    const next = state.update(
      makeContext(registry, {
        recessive: menuFlick(MENU_DIRECTIONS.creation, { buttons: { grip: true } }),
      })
    );
    expect(next).toBe(StateId.Locomotion);
  });
});
