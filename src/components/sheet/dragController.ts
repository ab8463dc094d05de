import { resolveTuning, type SheetTuning } from './config';
import { growth, toScreenOffset, type SheetEdge } from './edge';
import { logger } from './logger';
import { SnapSet } from './snapSet';
import {
  createResolver,
  describeSize,
  EMPTY_LAYOUT,
  type HeightResolver,
  type SheetLayout,
  type SizeSpec,
} from './sizeSpec';

export type GesturePhase = 'began' | 'changed' | 'ended' | 'cancelled' | 'failed';

export interface Point {
  x: number;
  y: number;
}

export interface GestureSample {
  phase: GesturePhase;
  /** Pointer travel since the gesture started, in screen coordinates. */
  translation: Point;
  /** Units per second, in screen coordinates. */
  velocity: Point;
}

export type IgnoreReason = 'already-dragging' | 'not-dragging' | 'invalid-sample';

export type DragOutput =
  | { type: 'ignored'; reason: IgnoreReason }
  | { type: 'frame'; height: number; offset: number }
  | { type: 'revert'; height: number; duration: number }
  | { type: 'settle'; size: SizeSpec; height: number; duration: number }
  | { type: 'dismiss'; duration: number };

export type ResizeOutput = { type: 'resize'; size: SizeSpec; height: number; duration: number };
export type DismissOutput = Extract<DragOutput, { type: 'dismiss' }>;

export interface SheetState {
  preferredSize: SizeSpec;
  actualHeight: number;
}

export type DragPhase = 'idle' | 'dragging';

interface DragSession {
  anchorHeight: number;
  anchorPoint: Point;
}

interface DragGeometry {
  height: number;
  overscroll: number;
  delta: number;
  minHeight: number;
}

export interface DragControllerOptions {
  edge?: SheetEdge;
  sizes?: readonly SizeSpec[];
  layout?: SheetLayout;
  tuning?: Partial<SheetTuning>;
}

const isFinitePoint = (p: Point) => Number.isFinite(p.x) && Number.isFinite(p.y);

/**
 * Turns drag samples into live geometry and a terminal decision.
 *
 * Edge polarity is applied only when reading samples (`growth`) and when
 * emitting offsets (`toScreenOffset`); everything in between works on the
 * growth axis, where positive means taller.
 */
export class DragController {
  readonly edge: SheetEdge;
  readonly tuning: Readonly<SheetTuning>;

  private resolve: HeightResolver;
  private snaps: SnapSet;
  private sheet: SheetState;
  private session: DragSession | null = null;

  constructor(options: DragControllerOptions = {}) {
    this.edge = options.edge ?? 'bottom';
    this.tuning = resolveTuning(options.tuning);
    this.resolve = createResolver({ ...(options.layout ?? EMPTY_LAYOUT) }, this.edge, this.tuning);
    this.snaps = SnapSet.create(options.sizes ?? [], this.resolve);
    const initial = this.snaps.first;
    this.sheet = { preferredSize: initial, actualHeight: this.resolve(initial) };
  }

  get phase(): DragPhase {
    return this.session ? 'dragging' : 'idle';
  }

  get state(): Readonly<SheetState> {
    return { ...this.sheet };
  }

  get snapSet(): SnapSet {
    return this.snaps;
  }

  get preferredHeight() {
    return this.resolve(this.sheet.preferredSize);
  }

  heightOf(spec: SizeSpec) {
    return this.resolve(spec);
  }

  updateLayout(layout: SheetLayout) {
    this.resolve = createResolver({ ...layout }, this.edge, this.tuning);
    this.snaps = this.snaps.relayout(this.resolve);
    if (!this.session) {
      this.sheet.actualHeight = this.resolve(this.sheet.preferredSize);
    }
  }

  handle(sample: GestureSample, liveHeight?: number): DragOutput {
    const { phase } = sample;
    const valid = isFinitePoint(sample.translation) && isFinitePoint(sample.velocity);
    if (phase === 'began') {
      return valid ? this.begin(sample, liveHeight) : { type: 'ignored', reason: 'invalid-sample' };
    }

    const session = this.session;
    if (!session) return { type: 'ignored', reason: 'not-dragging' };

    switch (phase) {
      case 'changed': {
        if (!valid) return { type: 'ignored', reason: 'invalid-sample' };
        const geometry = this.measure(session, sample.translation);
        return { type: 'frame', height: geometry.height, offset: toScreenOffset(geometry.overscroll, this.edge) };
      }
      // A revert needs no translation, so cancellation is honoured whatever the sample holds
      case 'cancelled':
      case 'failed':
        return this.revert();
      case 'ended':
        if (!valid) return this.revert();
        this.session = null;
        return this.release(session, sample);
    }
  }

  /** Called by the host once a settle animation has finished. */
  settleCompleted(height: number) {
    if (this.session || !Number.isFinite(height)) return;
    this.sheet.actualHeight = Math.max(0, height);
  }

  setSnapSet(sizes: readonly SizeSpec[], animated = true): ResizeOutput | null {
    if (sizes.length === 0) {
      logger.warn('empty snap set ignored');
      return null;
    }
    if (this.session) {
      logger.warn('snap set change ignored while dragging');
      return null;
    }
    this.snaps = SnapSet.create(sizes, this.resolve);
    return this.resizeTo(this.snaps.first, animated);
  }

  resizeTo(size: SizeSpec, animated = true): ResizeOutput | null {
    if (this.session) {
      logger.warn('resize ignored while dragging', { size: describeSize(size) });
      return null;
    }
    const height = this.resolve(size);
    this.sheet = { preferredSize: size, actualHeight: height };
    return { type: 'resize', size, height, duration: animated ? this.tuning.resizeDuration : 0 };
  }

  close(duration = this.tuning.closeDuration): DismissOutput | null {
    if (this.session) return null;
    return { type: 'dismiss', duration };
  }

  private revert(): DragOutput {
    this.session = null;
    return { type: 'revert', height: this.preferredHeight, duration: this.tuning.revertDuration };
  }

  private begin(sample: GestureSample, liveHeight?: number): DragOutput {
    if (this.session) {
      logger.warn('began received while already dragging');
      return { type: 'ignored', reason: 'already-dragging' };
    }
    if (liveHeight !== undefined && Number.isFinite(liveHeight)) {
      this.sheet.actualHeight = Math.max(0, liveHeight);
    }
    this.session = { anchorHeight: this.sheet.actualHeight, anchorPoint: { ...sample.translation } };
    return { type: 'frame', height: this.sheet.actualHeight, offset: 0 };
  }

  private measure(session: DragSession, translation: Point): DragGeometry {
    const { anchorHeight, anchorPoint } = session;
    const delta = growth(translation.y, this.edge) - growth(anchorPoint.y, this.edge);
    const minHeight = Math.min(anchorHeight, this.snaps.minHeight);
    const maxHeight = Math.max(anchorHeight, this.snaps.maxHeight);

    let height = Math.max(0, anchorHeight + delta);
    let overscroll = 0;
    if (height < minHeight) {
      overscroll = minHeight - height;
      height = minHeight;
    }
    if (height > maxHeight) {
      height = maxHeight;
    }
    return { height, overscroll, delta, minHeight };
  }

  private release(session: DragSession, sample: GestureSample): DragOutput {
    const geometry = this.measure(session, sample.translation);
    const t = this.tuning;
    const velocityTerm = t.velocityFactor * -growth(sample.velocity.y, this.edge);

    let finalHeight = geometry.height - geometry.overscroll - velocityTerm;
    if (velocityTerm > t.hardDismissVelocity) {
      finalHeight = -1;
    }

    const duration = Math.min(Math.abs(velocityTerm) * t.durationPerVelocity + t.baseSettleDuration, t.maxSettleDuration);

    if (finalHeight < geometry.minHeight / 2) {
      logger.debug('drag released into dismiss', { finalHeight, minHeight: geometry.minHeight });
      return { type: 'dismiss', duration };
    }

    const size = geometry.delta > 0 ? this.snaps.pickGrowing(finalHeight) : this.snaps.pickShrinking(finalHeight);
    this.sheet.preferredSize = size;
    return { type: 'settle', size, height: this.resolve(size), duration };
  }
}
