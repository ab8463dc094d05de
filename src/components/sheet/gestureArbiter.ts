import type { Point } from './dragController';
import { growth, type SheetEdge } from './edge';

export interface ScrollRegion {
  /** Top of the visible region, in the same space as the touch point. */
  top: number;
  height: number;
  scrollOffset: number;
}

export interface ActivationInput {
  touchPoint: Point;
  scrollRegion?: ScrollRegion | null;
  velocity: Point;
  currentHeight: number;
  maxHeight: number;
  fullHeight: number;
  edge: SheetEdge;
  startedOnControl?: boolean;
}

export const INTERACTIVE_SELECTOR =
  'button, a, [role="button"], input, select, textarea, [contenteditable="true"], [data-sheet-no-drag]';

export function isInsideRegion(point: Point, region: ScrollRegion) {
  return point.y > region.top && point.y < region.top + region.height;
}

/**
 * Decides once, before any sample is processed, whether a gesture drags the
 * sheet or is left to the nested scroll region.
 */
export function shouldActivate(input: ActivationInput): boolean {
  if (input.startedOnControl) return false;

  const region = input.scrollRegion;
  if (!region || !isInsideRegion(input.touchPoint, region)) return true;

  const { velocity } = input;
  if (Math.abs(velocity.y) <= Math.abs(velocity.x)) return false;
  if (region.scrollOffset !== 0) return false;

  if (growth(velocity.y, input.edge) <= 0) return true;

  // Growing: only when there is a larger snap left and room below full
  return input.maxHeight > input.currentHeight && input.currentHeight < input.fullHeight;
}

export function isInteractiveTarget(target: Element | null): boolean {
  if (!target) return false;
  if (target instanceof HTMLElement && target.isContentEditable) return true;
  return target.closest(INTERACTIVE_SELECTOR) !== null;
}
