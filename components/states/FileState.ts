// components/states/FileState.ts
import { logger } from "../logger";
import { parseTrackSetSaveData, serializeTrackSet, TrackStateFormatError } from "../saveState";
import { nextTrackFileName, NEW_FILE_SLOT, sortTrackPaths, TrackStore } from "../storage";
import { TrackPairRegistry } from "../TrackPairRegistry";
import { TrackOptions, TrackSetSaveData } from "../types";
import { BaseState, StateContext, StateId } from "./BaseState";

// Result of a finished storage call, applied at the start of a later tick
type Completion = (registry: TrackPairRegistry) => void;

/**
 * Save, load and delete track sets. The selection cycles through the stored
 * files and a final "new file" slot.
 *
 * Storage calls run in the background, one at a time. Their results are
 * applied on the next tick. Malformed track data is rethrown from that tick;
 * any other storage failure is logged and changes nothing.
 */
export class FileState extends BaseState {
  private readonly store: TrackStore;
  private readonly trackOptions: Partial<TrackOptions>;
  private files: string[] = [];
  private selected = 0;
  private entering = true;
  private pending: Promise<void> | null = null;
  private completions: Completion[] = [];
  private failure: { error: unknown } | null = null;
  private generation = 0;

  constructor(store: TrackStore, trackOptions: Partial<TrackOptions> = {}) {
    super(StateId.File, "Save/Load");
    this.store = store;
    this.trackOptions = trackOptions;
  }

  get busy(): boolean {
    return this.pending !== null;
  }

  get fileList(): readonly string[] {
    return this.files;
  }

  get selection(): string {
    return this.files[this.selected] ?? NEW_FILE_SLOT;
  }

  detail(): string {
    return this.selection;
  }

  // Resolves once the storage call in flight (if any) has finished
  settled(): Promise<void> {
    return this.pending ?? Promise.resolve();
  }

  protected step(ctx: StateContext): number | undefined {
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      throw error;
    }
    const done = this.completions;
    this.completions = [];
    done.forEach((apply) => apply(ctx.registry));

    if (this.entering) {
      this.entering = false;
      this.selected = this.files.length;
      this.run(() => this.refreshList());
    }

    const { dominant, recessive } = ctx;
    if (dominant.axisPressed && dominant.axis.y !== 0) {
      const slots = this.files.length + 1;
      const step = dominant.axis.y > 0 ? 1 : -1;
      this.selected = (this.selected + step + slots) % slots;
    }

    const target = this.files[this.selected];
    if (dominant.pressed.primary) {
      const data = ctx.registry.toSaveData();
      this.run(() => this.save(data, target));
    } else if (dominant.pressed.secondary && target !== undefined) {
      this.run(() => this.load(target));
    }
    if (recessive.pressed.secondary && target !== undefined) {
      this.run(() => this.remove(target));
    }
    return undefined;
  }

  protected exit(): void {
    this.generation++;
    this.pending = null;
    this.completions = [];
    this.failure = null;
    this.entering = true;
    this.selected = this.files.length;
  }

  private run(task: () => Promise<Completion>) {
    if (this.pending) {
      logger.debug("Storage is busy, ignoring command");
      return;
    }
    const generation = this.generation;
    const promise: Promise<void> = task()
      .then(
        (completion) => {
          if (generation === this.generation) {
            this.completions.push(completion);
          }
        },
        (error: unknown) => {
          if (generation !== this.generation) {
            return;
          }
          if (error instanceof TrackStateFormatError) {
            this.failure = { error };
          } else {
            logger.error("Track storage call failed:", error);
          }
        }
      )
      .finally(() => {
        if (this.pending === promise) {
          this.pending = null;
        }
      });
    this.pending = promise;
  }

  private async refreshList(): Promise<Completion> {
    const files = await this.store.list();
    logger.debug(`Found ${files.length} track files`);
    return () => {
      this.files = files;
      this.selected = files.length;
    };
  }

  private async save(data: TrackSetSaveData, target: string | undefined): Promise<Completion> {
    const existing = await this.store.list();
    const filePath = target ?? this.store.pathFor(nextTrackFileName(existing));
    await this.store.write(filePath, serializeTrackSet(data));
    logger.info(`Saved ${data.positionTracks.length} track pairs to ${filePath}`);
    const files = sortTrackPaths(existing.includes(filePath) ? existing : [...existing, filePath]);
    return () => {
      this.files = files;
      this.selected = files.length;
    };
  }

  private async load(filePath: string): Promise<Completion> {
    const contents = await this.store.read(filePath);
    if (contents === undefined) {
      logger.debug(`${filePath} no longer exists, skipping load`);
      return () => undefined;
    }
    const data = parseTrackSetSaveData(contents);
    logger.info(`Loaded ${data.positionTracks.length} track pairs from ${filePath}`);
    return (registry) => {
      registry.load(data, this.trackOptions);
    };
  }

  private async remove(filePath: string): Promise<Completion> {
    await this.store.remove(filePath);
    logger.info(`Deleted ${filePath}`);
    return () => {
      this.files = this.files.filter((p) => p !== filePath);
      this.selected = this.files.length;
    };
  }
}
