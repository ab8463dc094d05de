import { chromeHeight, SHEET_DEFAULTS, type SheetTuning } from './config';
import type { SheetEdge } from './edge';

export type SizeSpec =
  | { readonly kind: 'fixed'; readonly height: number }
  | { readonly kind: 'proportional'; readonly fraction: number }
  | { readonly kind: 'full' };

export const fixedSize = (height: number): SizeSpec => Object.freeze({ kind: 'fixed', height });
export const proportionalSize = (fraction: number): SizeSpec => Object.freeze({ kind: 'proportional', fraction });
export const halfSize = (): SizeSpec => proportionalSize(0.5);
export const fullSize = (): SizeSpec => Object.freeze({ kind: 'full' });

export const DEFAULT_SIZES: readonly SizeSpec[] = Object.freeze([fixedSize(300), fullSize()]);

export interface SheetLayout {
  availableExtent: number;
  topInset: number;
  bottomInset: number;
}

export const EMPTY_LAYOUT: Readonly<SheetLayout> = Object.freeze({ availableExtent: 0, topInset: 0, bottomInset: 0 });

export type HeightResolver = (spec: SizeSpec) => number;

export function sameSize(a: SizeSpec, b: SizeSpec) {
  if (a.kind === 'fixed' && b.kind === 'fixed') return a.height === b.height;
  if (a.kind === 'proportional' && b.kind === 'proportional') return a.fraction === b.fraction;
  return a.kind === b.kind;
}

/**
 * Largest height the sheet may take. The inset on the far edge (top for a
 * bottom sheet) never drops below `minimumEdgeInset`.
 */
export function maxSheetHeight(layout: SheetLayout, edge: SheetEdge, tuning: Readonly<SheetTuning> = SHEET_DEFAULTS) {
  const farInset = edge === 'bottom' ? layout.topInset : layout.bottomInset;
  const inset = Math.max(farInset, tuning.minimumEdgeInset);
  return layout.availableExtent - inset - tuning.margin;
}

export function resolveHeight(
  spec: SizeSpec,
  layout: SheetLayout,
  edge: SheetEdge,
  tuning: Readonly<SheetTuning> = SHEET_DEFAULTS
): number {
  const height = rawHeight(spec, layout, maxSheetHeight(layout, edge, tuning), tuning);
  return Number.isFinite(height) ? Math.max(0, height) : 0;
}

function rawHeight(spec: SizeSpec, layout: SheetLayout, maxHeight: number, tuning: Readonly<SheetTuning>) {
  switch (spec.kind) {
    case 'fixed': return Math.min(spec.height, maxHeight);
    case 'full': return maxHeight;
    case 'proportional': return spec.fraction * layout.availableExtent + chromeHeight(tuning);
  }
}

export function createResolver(layout: SheetLayout, edge: SheetEdge, tuning: Readonly<SheetTuning> = SHEET_DEFAULTS): HeightResolver {
  return spec => resolveHeight(spec, layout, edge, tuning);
}

export function describeSize(spec: SizeSpec) {
  switch (spec.kind) {
    case 'fixed': return `fixed(${spec.height})`;
    case 'proportional': return `proportional(${spec.fraction})`;
    case 'full': return 'full';
  }
}
