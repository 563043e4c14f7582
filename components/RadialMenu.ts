// components/RadialMenu.ts
import * as THREE from "three";

export interface MenuSelector {
  selectFromDirection: (axis: THREE.Vector2) => number;
  highlight?: (index: number) => void;
}

/**
 * Sectors laid out around the thumbstick. Sector 0 is centered on up (+y)
 * and indices increase clockwise.
 */
export class RadialMenu implements MenuSelector {
  public readonly labels: readonly string[];
  public highlighted = -1;

  constructor(labels: readonly string[]) {
    if (labels.length === 0) {
      throw new Error("RadialMenu needs at least one sector");
    }
    this.labels = labels;
  }

  get sectorWidth(): number {
    return (Math.PI * 2) / this.labels.length;
  }

  selectFromDirection(axis: THREE.Vector2): number {
    if (axis.lengthSq() === 0) {
      return -1;
    }
    let angle = Math.atan2(axis.x, axis.y);
    if (angle < 0) {
      angle += Math.PI * 2;
    }
    const width = this.sectorWidth;
    return Math.floor((angle + width / 2) / width) % this.labels.length;
  }

  highlight(index: number): void {
    this.highlighted = index;
  }

  label(index: number): string | undefined {
    return this.labels[index];
  }
}
