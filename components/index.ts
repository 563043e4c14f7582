export * from "./types";
export { logger } from "./logger";
export * from "./config";
export * from "./input";
export * from "./RadialMenu";
export * from "./saveState";
export * from "./storage";
export * from "./firebase";
export { Track, DEFAULT_TRACK_OPTIONS, speedColor } from "./Track";
export { TrackPair, PairSample } from "./TrackPair";
export { TrackPairRegistry } from "./TrackPairRegistry";
export { BaseState, StateContext, StateId } from "./states/BaseState";
export { LocomotionState, LocomotionOptions } from "./states/LocomotionState";
export { CreationState } from "./states/CreationState";
export { EditState, EditOptions, Selection, SelectionKind } from "./states/EditState";
export { ViewState } from "./states/ViewState";
export { FileState } from "./states/FileState";
export { StateManager, StateManagerOptions, STATE_LABELS } from "./StateManager";
