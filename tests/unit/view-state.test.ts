import * as THREE from "three";
import { RadialMenu } from "../../components/RadialMenu";
import { STATE_LABELS } from "../../components/StateManager";
import { StateId } from "../../components/states/BaseState";
import { ViewState } from "../../components/states/ViewState";
import { TrackPairRegistry } from "../../components/TrackPairRegistry";
import { hand, makeContext, MENU_DIRECTIONS, menuFlick, straightPair } from "./helpers";

const flick = (y: number) => hand({ axis: new THREE.Vector2(0, y), axisPressed: true });

function setup(pairs: number) {
  const registry = new TrackPairRegistry();
  for (let i = 0; i < pairs; i++) {
    registry.add(straightPair(i));
  }
  const camera = new THREE.PerspectiveCamera();
  const state = new ViewState(camera);
  return { registry, camera, state };
}

describe("ViewState", () => {
  test("sends the user back to locomotion when there is nothing to view", () => {
    const info = jest.spyOn(console, "info").mockImplementation(() => undefined);
    const { registry, camera, state } = setup(0);
    const menu = new RadialMenu(STATE_LABELS);

    expect(state.update(makeContext(registry, { menu }))).toBe(StateId.Locomotion);
    expect(menu.highlighted).toBe(StateId.Locomotion);
    expect(camera.visible).toBe(false);
    expect(info).toHaveBeenCalledWith("[INFO]", "There are no tracks to view");
    info.mockRestore();
  });

  test("starts on the first pair at its playback cursor", () => {
    const { registry, camera, state } = setup(2);
    const first = registry.get(0);
    if (first) first.cursor = 0.5;

    expect(state.update(makeContext(registry))).toBe(StateId.View);
    expect(state.currentPair).toBe(0);
    expect(state.currentCursor).toBe(0.5);
    expect(state.detail()).toBe("Track 1");
    expect(camera.visible).toBe(true);
    expect(camera.position.toArray()).toEqual([0.5, 0, 0]);
  });

  test("flies along the pair and loops at the end", () => {
    const { registry, camera, state } = setup(1);
    state.update(makeContext(registry));
    state.update(makeContext(registry, { dt: 2 }));
    expect(state.currentCursor).toBeCloseTo(0.31, 10);
    expect(camera.position.x).toBeCloseTo(0.31, 10);

    state.update(makeContext(registry, { dt: 10 }));
    expect(state.currentCursor).toBe(0);
    expect(camera.position.toArray()).toEqual([0, 0, 0]);
  });

  test("cycles forward and backward through pairs", () => {
    const { registry, state } = setup(3);
    state.update(makeContext(registry));

    const seen: number[] = [];
    for (let i = 0; i < 3; i++) {
      state.update(makeContext(registry, { dominant: flick(1) }));
      seen.push(state.currentPair);
    }
    expect(seen).toEqual([1, 2, 0]);

    state.update(makeContext(registry, { dominant: flick(-1) }));
    expect(state.currentPair).toBe(2);
    expect(state.detail()).toBe("Track 3");
  });

  test("picks up the stored cursor of the pair it switches to", () => {
    const { registry, state } = setup(2);
    const second = registry.get(1);
    if (second) second.cursor = 0.25;
    state.update(makeContext(registry));
    state.update(makeContext(registry, { dominant: flick(1) }));
    expect(state.currentCursor).toBe(0.25);
  });

  test("hides the camera on exit and starts over on return", () => {
    const { registry, camera, state } = setup(2);
    state.update(makeContext(registry));
    state.update(makeContext(registry, { dominant: flick(1) }));

    const next = state.update(
      makeContext(registry, { recessive: menuFlick(MENU_DIRECTIONS.file) })
    );
    expect(next).toBe(StateId.File);
    expect(camera.visible).toBe(false);
    expect(state.detail()).toBe("");

    state.update(makeContext(registry));
    expect(state.currentPair).toBe(0);
  });
});
