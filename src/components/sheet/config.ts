import { SheetConfigurationError } from './errors';

export interface SheetTuning {
  /** Gap kept clear at the far edge, whatever the size. */
  margin: number;
  /** Floor applied to the far-edge safe-area inset. */
  minimumEdgeInset: number;
  handleTopInset: number;
  handleHeight: number;
  handleBottomInset: number;
  /** Scale applied to release velocity (units/s) before it is projected onto the height. */
  velocityFactor: number;
  /** Scaled closing velocity above which a release always dismisses. */
  hardDismissVelocity: number;
  durationPerVelocity: number;
  baseSettleDuration: number;
  maxSettleDuration: number;
  revertDuration: number;
  resizeDuration: number;
  closeDuration: number;
  touchStartThreshold: number;
  mouseStartThreshold: number;
}

export const SHEET_DEFAULTS: Readonly<SheetTuning> = Object.freeze({
  margin: 20,
  minimumEdgeInset: 20,
  handleTopInset: 9,
  handleHeight: 6,
  handleBottomInset: 9,
  velocityFactor: 0.2,
  hardDismissVelocity: 500,
  durationPerVelocity: 0.0002,
  baseSettleDuration: 0.2,
  maxSettleDuration: 0.5,
  revertDuration: 0.3,
  resizeDuration: 0.2,
  closeDuration: 0.3,
  touchStartThreshold: 8,
  mouseStartThreshold: 4,
});

const isTuningKey = (key: string): key is keyof SheetTuning => key in SHEET_DEFAULTS;

export function resolveTuning(overrides: Partial<SheetTuning> = {}): Readonly<SheetTuning> {
  const merged: SheetTuning = { ...SHEET_DEFAULTS };
  for (const key of Object.keys(overrides)) {
    if (!isTuningKey(key)) continue;
    const value = overrides[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new SheetConfigurationError('E_INVALID_TUNING', `Invalid sheet tuning "${key}": ${value}`, { key, value });
    }
    merged[key] = value;
  }
  return Object.freeze(merged);
}

/** Height of the pull bar drawn above (or below, for top sheets) the content. */
export function chromeHeight(tuning: Readonly<SheetTuning>) {
  return tuning.handleTopInset + tuning.handleHeight + tuning.handleBottomInset;
}
