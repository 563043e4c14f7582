// components/input.ts
import * as THREE from "three";

export type Hand = "dominant" | "recessive";

export type HandButton =
  | "trigger"
  | "grip"
  | "primary"
  | "secondary"
  | "menu"
  | "axisClick";

export const HAND_BUTTONS: readonly HandButton[] = [
  "trigger",
  "grip",
  "primary",
  "secondary",
  "menu",
  "axisClick",
];

export type ButtonStates = Record<HandButton, boolean>;

// What the host reads from one controller (or its desktop emulation) each tick
export interface RawHandState {
  probe: THREE.Vector3;
  controllerPosition: THREE.Vector3;
  pointer: THREE.Vector3;
  axis: THREE.Vector2;
  trigger: number;
  grip: number;
  buttons: Partial<ButtonStates>;
}

/**
 * One tick of input for one hand. `buttons` holds the current level,
 * `pressed` and `released` the edges since the previous tick, and
 * `axisPressed` is true on the tick the thumbstick leaves center.
 */
export interface HandSnapshot {
  probe: THREE.Vector3;
  controllerPosition: THREE.Vector3;
  pointer: THREE.Vector3;
  axis: THREE.Vector2;
  trigger: number;
  grip: number;
  buttons: ButtonStates;
  pressed: ButtonStates;
  released: ButtonStates;
  axisPressed: boolean;
}

export interface HandSnapshotInit {
  probe?: THREE.Vector3;
  controllerPosition?: THREE.Vector3;
  pointer?: THREE.Vector3;
  axis?: THREE.Vector2;
  trigger?: number;
  grip?: number;
  buttons?: Partial<ButtonStates>;
  pressed?: Partial<ButtonStates>;
  released?: Partial<ButtonStates>;
  axisPressed?: boolean;
}

const ANALOG_PRESS_THRESHOLD = 0.5;

export function buttonStates(init: Partial<ButtonStates> = {}): ButtonStates {
  return {
    trigger: init.trigger ?? false,
    grip: init.grip ?? false,
    primary: init.primary ?? false,
    secondary: init.secondary ?? false,
    menu: init.menu ?? false,
    axisClick: init.axisClick ?? false,
  };
}

export function createHandSnapshot(init: HandSnapshotInit = {}): HandSnapshot {
  return {
    probe: init.probe ?? new THREE.Vector3(),
    controllerPosition: init.controllerPosition ?? new THREE.Vector3(),
    pointer: init.pointer ?? new THREE.Vector3(0, 0, -1),
    axis: init.axis ?? new THREE.Vector2(),
    trigger: init.trigger ?? 0,
    grip: init.grip ?? 0,
    buttons: buttonStates(init.buttons),
    pressed: buttonStates(init.pressed),
    released: buttonStates(init.released),
    axisPressed: init.axisPressed ?? false,
  };
}

// A hand with nothing held and no edges
export function idleHand(): HandSnapshot {
  return createHandSnapshot();
}

/**
 * Turns raw per-tick controller state into snapshots with edges, by comparing
 * against what the same hand reported on the previous tick.
 */
export class HandInputTracker {
  private previous: ButtonStates = buttonStates();
  private axisWasActive = false;
  private readonly deadzone: number;

  constructor(deadzone = 0.2) {
    this.deadzone = deadzone;
  }

  update(raw: RawHandState): HandSnapshot {
    const buttons = buttonStates(raw.buttons);
    if (raw.buttons.trigger === undefined) {
      buttons.trigger = raw.trigger >= ANALOG_PRESS_THRESHOLD;
    }
    if (raw.buttons.grip === undefined) {
      buttons.grip = raw.grip >= ANALOG_PRESS_THRESHOLD;
    }

    const pressed = buttonStates();
    const released = buttonStates();
    for (const button of HAND_BUTTONS) {
      pressed[button] = buttons[button] && !this.previous[button];
      released[button] = !buttons[button] && this.previous[button];
    }

    const axisActive = raw.axis.length() > this.deadzone;
    const axisPressed = axisActive && !this.axisWasActive;

    this.previous = buttons;
    this.axisWasActive = axisActive;

    return {
      probe: raw.probe.clone(),
      controllerPosition: raw.controllerPosition.clone(),
      pointer: raw.pointer.clone(),
      axis: axisActive ? raw.axis.clone() : new THREE.Vector2(),
      trigger: raw.trigger,
      grip: raw.grip,
      buttons,
      pressed,
      released,
      axisPressed,
    };
  }

  reset(): void {
    this.previous = buttonStates();
    this.axisWasActive = false;
  }
}
