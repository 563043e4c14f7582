// components/StateManager.ts
import * as THREE from "three";
import { DEFAULT_SETTINGS, InteractionSettings } from "./config";
import { disposeObject } from "./disposal";
import { HandSnapshot } from "./input";
import { MenuSelector, RadialMenu } from "./RadialMenu";
import { BaseState, StateId } from "./states/BaseState";
import { CreationState } from "./states/CreationState";
import { EditState } from "./states/EditState";
import { FileState } from "./states/FileState";
import { LocomotionState } from "./states/LocomotionState";
import { ViewState } from "./states/ViewState";
import { TrackStore } from "./storage";
import { TrackPairRegistry } from "./TrackPairRegistry";
import { FeedbackChannel, FeedbackSurface, TrackOptions } from "./types";

// Menu sector labels, indexed by state id
export const STATE_LABELS: readonly string[] = [
  "Teleport",
  "Create",
  "Edit",
  "Flythrough",
  "Save/Load",
];

export interface StateManagerOptions {
  store: TrackStore;
  settings?: Partial<InteractionSettings>;
  menu?: MenuSelector;
  feedback?: FeedbackSurface;
  rig?: THREE.Object3D;
  teleportMarker?: THREE.Object3D;
  viewCamera?: THREE.PerspectiveCamera;
}

function defaultTeleportMarker(): THREE.Mesh {
  const marker = new THREE.Mesh(
    new THREE.CylinderGeometry(0.5, 0.5, 0.02, 32),
    new THREE.MeshBasicMaterial({ color: 0x00ffff })
  );
  marker.name = "Teleport Marker";
  return marker;
}

/**
 * Owns the track registry and one instance of every interaction state, and
 * drives them one tick at a time. Add `root` to the scene to see the tracks
 * and the state visuals.
 */
export class StateManager {
  public readonly root = new THREE.Group();
  public readonly registry = new TrackPairRegistry();
  public readonly menu: MenuSelector;
  public readonly rig: THREE.Object3D;
  public readonly teleportMarker: THREE.Object3D;
  public readonly viewCamera: THREE.PerspectiveCamera;

  public readonly locomotion: LocomotionState;
  public readonly creation: CreationState;
  public readonly edit: EditState;
  public readonly view: ViewState;
  public readonly file: FileState;

  private readonly base = new BaseState();
  private readonly states: Map<number, BaseState>;
  private readonly feedback: FeedbackSurface | undefined;
  private shown: Record<FeedbackChannel, string | undefined> = {
    state: undefined,
    detail: undefined,
  };
  private current: number = StateId.Locomotion;

  constructor(options: StateManagerOptions) {
    const settings: InteractionSettings = { ...DEFAULT_SETTINGS, ...options.settings };
    const trackOptions: TrackOptions = {
      minSpeed: settings.minSpeed,
      maxSpeed: settings.maxSpeed,
    };

    this.menu = options.menu ?? new RadialMenu(STATE_LABELS);
    this.feedback = options.feedback;
    this.rig = options.rig ?? new THREE.Object3D();
    this.teleportMarker = options.teleportMarker ?? defaultTeleportMarker();
    this.viewCamera = options.viewCamera ?? new THREE.PerspectiveCamera(60, 16 / 9, 0.01, 100);

    this.locomotion = new LocomotionState({
      rig: this.rig,
      marker: this.teleportMarker,
      castSensitivity: settings.castSensitivity,
      heightOffset: new THREE.Vector3(...settings.heightOffset),
    });
    this.creation = new CreationState(trackOptions);
    this.edit = new EditState({
      selectionRadius: settings.selectionRadius,
      speedSensitivity: settings.speedSensitivity,
    });
    this.view = new ViewState(this.viewCamera);
    this.file = new FileState(options.store, trackOptions);

    this.states = new Map<number, BaseState>(
      [this.locomotion, this.creation, this.edit, this.view, this.file].map((s): [number, BaseState] => [s.id, s])
    );

    this.root.name = "Curve Dolly";
    this.root.add(this.registry.root, this.teleportMarker, this.creation.markers, this.viewCamera);
  }

  get currentState(): number {
    return this.current;
  }

  get activeState(): BaseState {
    return this.states.get(this.current) ?? this.base;
  }

  // Runs the active state, moves every playback cursor, then refreshes feedback
  tick(dominant: HandSnapshot, recessive: HandSnapshot, dt: number): number {
    const next = this.activeState.update({
      dominant,
      recessive,
      registry: this.registry,
      menu: this.menu,
      dt,
    });
    this.current = this.states.has(next) ? next : StateId.Base;

    this.registry.advance(dt);
    this.updateFeedback();
    return this.current;
  }

  dispose(): void {
    this.registry.clear();
    disposeObject(this.root);
    this.root.removeFromParent();
  }

  private updateFeedback() {
    const state = this.activeState;
    this.show("state", state.label);
    this.show("detail", state.detail());
  }

  private show(channel: FeedbackChannel, text: string) {
    if (this.shown[channel] === text) {
      return;
    }
    this.shown[channel] = text;
    this.feedback?.setText(channel, text);
  }
}
