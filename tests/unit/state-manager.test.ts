import * as THREE from "three";
import { HandSnapshot } from "../../components/input";
import { MenuSelector } from "../../components/RadialMenu";
import { StateManager } from "../../components/StateManager";
import { StateId } from "../../components/states/BaseState";
import { InMemoryTrackStore } from "../../components/storage";
import { FeedbackChannel } from "../../components/types";
import { hand, MENU_DIRECTIONS, menuFlick, vec } from "./helpers";

function setup(menu?: MenuSelector) {
  const lines: [FeedbackChannel, string][] = [];
  const manager = new StateManager({
    store: new InMemoryTrackStore(),
    menu,
    feedback: { setText: (channel, text) => lines.push([channel, text]) },
  });
  const tick = (dominant: HandSnapshot = hand(), recessive: HandSnapshot = hand(), dt = 0) =>
    manager.tick(dominant, recessive, dt);
  return { manager, lines, tick };
}

const press = (x: number) =>
  hand({ probe: vec(x, 0, 0), buttons: { trigger: true }, pressed: { trigger: true } });

describe("StateManager", () => {
  test("starts in locomotion and reports it once", () => {
    const { manager, lines, tick } = setup();
    expect(manager.currentState).toBe(StateId.Locomotion);

    tick();
    tick();
    expect(lines).toEqual([
      ["state", "Teleport"],
      ["detail", ""],
    ]);
  });

  test("switches state from the recessive menu flick", () => {
    const { manager, lines, tick } = setup();
    tick();
    expect(tick(hand(), menuFlick(MENU_DIRECTIONS.creation))).toBe(StateId.Creation);
    expect(manager.activeState).toBe(manager.creation);
    expect(lines.slice(2)).toEqual([
      ["state", "Create"],
      ["detail", "Camera path"],
    ]);
  });

  test("keeps the current state when the grip is held during a flick", () => {
    const { tick } = setup();
    expect(tick(hand(), menuFlick(MENU_DIRECTIONS.edit, { buttons: { grip: true } }))).toBe(
      StateId.Locomotion
    );
  });

  test("falls back to the base state for unknown menu entries", () => {
    let next = 7;
    const menu: MenuSelector = { selectFromDirection: () => next };
    const { manager, lines, tick } = setup(menu);

    expect(tick(hand(), menuFlick(MENU_DIRECTIONS.edit))).toBe(StateId.Base);
    expect(lines).toEqual([
      ["state", ""],
      ["detail", ""],
    ]);

    expect(tick()).toBe(StateId.Base);
    next = StateId.Edit;
    expect(tick(hand(), menuFlick(MENU_DIRECTIONS.edit))).toBe(StateId.Edit);
    expect(manager.activeState).toBe(manager.edit);
  });

  test("view bounces back to locomotion while there are no tracks", () => {
    const info = jest.spyOn(console, "info").mockImplementation(() => undefined);
    const { tick } = setup();
    expect(tick(hand(), menuFlick(MENU_DIRECTIONS.view))).toBe(StateId.View);
    expect(tick()).toBe(StateId.Locomotion);
    info.mockRestore();
  });

  test("advances playback cursors in every state", () => {
    const { manager, tick } = setup();
    tick(hand(), menuFlick(MENU_DIRECTIONS.creation));
    tick(press(0));
    tick(press(1));
    tick(press(2));
    tick(press(3));
    expect(manager.registry.size).toBe(1);
    expect(manager.registry.get(0)?.cursor).toBe(0);

    tick(hand(), hand(), 1);
    expect(manager.registry.get(0)?.cursor).toBeCloseTo(0.155, 10);

    tick(hand(), menuFlick(MENU_DIRECTIONS.edit), 1);
    expect(manager.currentState).toBe(StateId.Edit);
    expect(manager.registry.get(0)?.cursor).toBeCloseTo(0.31, 10);
  });

  test("applies interaction settings to the states", () => {
    const rig = new THREE.Object3D();
    const manager = new StateManager({
      store: new InMemoryTrackStore(),
      rig,
      settings: { castSensitivity: 4, minSpeed: 0.1, maxSpeed: 0.5 },
    });
    const cast = hand({ buttons: { trigger: true }, pointer: vec(1, 0, 0) });
    manager.tick(cast, hand(), 0.5);
    manager.tick(cast, hand(), 0.5);
    manager.tick(hand(), hand(), 0.5);
    expect(rig.position.toArray()).toEqual([2, 0, 0]);

    manager.tick(hand(), menuFlick(MENU_DIRECTIONS.creation), 0);
    for (let i = 0; i < 4; i++) {
      manager.tick(press(i), hand(), 0);
    }
    expect(manager.registry.get(0)?.position.getCheckpoint(0)?.speed).toBeCloseTo(0.3, 10);
  });

  test("puts tracks and state visuals under one root", () => {
    const { manager } = setup();
    expect(manager.root.children).toEqual([
      manager.registry.root,
      manager.teleportMarker,
      manager.creation.markers,
      manager.viewCamera,
    ]);
    const scene = new THREE.Scene();
    scene.add(manager.root);
    manager.dispose();
    expect(scene.children).toHaveLength(0);
  });
});
