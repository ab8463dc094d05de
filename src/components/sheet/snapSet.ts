import { DEFAULT_SIZES, type HeightResolver, type SizeSpec } from './sizeSpec';

interface SnapEntry {
  size: SizeSpec;
  height: number;
}

/**
 * Sizes the sheet pins to, ascending by resolved height. Ties keep their
 * input order. Never empty.
 */
export class SnapSet {
  private readonly entries: readonly SnapEntry[];

  private constructor(entries: SnapEntry[]) {
    this.entries = Object.freeze(entries);
  }

  static create(sizes: readonly SizeSpec[], resolve: HeightResolver): SnapSet {
    const source = sizes.length > 0 ? sizes : DEFAULT_SIZES;
    const entries = source.map(size => ({ size, height: resolve(size) }));
    // Array.prototype.sort is stable, so equal heights keep input order
    entries.sort((a, b) => a.height - b.height);
    return new SnapSet(entries);
  }

  relayout(resolve: HeightResolver): SnapSet {
    return SnapSet.create(this.sizes, resolve);
  }

  get sizes(): SizeSpec[] {
    return this.entries.map(entry => entry.size);
  }

  heights(): number[] {
    return this.entries.map(entry => entry.height);
  }

  get first(): SizeSpec {
    return this.entries[0].size;
  }

  get last(): SizeSpec {
    return this.entries[this.entries.length - 1].size;
  }

  get minHeight() {
    return this.entries[0].height;
  }

  get maxHeight() {
    return this.entries[this.entries.length - 1].height;
  }

  get length() {
    return this.entries.length;
  }

  /** Smallest entry at or above `finalHeight`, or the largest entry. */
  pickGrowing(finalHeight: number): SizeSpec {
    let picked = this.entries[this.entries.length - 1];
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (finalHeight > entry.height) break;
      picked = entry;
    }
    return picked.size;
  }

  /** Largest entry at or below `finalHeight`, or the smallest entry. */
  pickShrinking(finalHeight: number): SizeSpec {
    let picked = this.entries[0];
    for (const entry of this.entries) {
      if (finalHeight < entry.height) break;
      picked = entry;
    }
    return picked.size;
  }
}
