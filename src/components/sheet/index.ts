export { Sheet, SheetBody, SheetHeader } from './Sheet';
export type { SheetBodyProps, SheetHandle, SheetHeaderProps, SheetInsets, SheetProps } from './Sheet';
export { DragController } from './dragController';
export type {
  DismissOutput,
  DragControllerOptions,
  DragOutput,
  DragPhase,
  GesturePhase,
  GestureSample,
  IgnoreReason,
  Point,
  ResizeOutput,
  SheetState,
} from './dragController';
export { SnapSet } from './snapSet';
export {
  createResolver,
  DEFAULT_SIZES,
  describeSize,
  fixedSize,
  fullSize,
  halfSize,
  maxSheetHeight,
  proportionalSize,
  resolveHeight,
  sameSize,
} from './sizeSpec';
export type { HeightResolver, SheetLayout, SizeSpec } from './sizeSpec';
export { growth, toScreenOffset } from './edge';
export type { SheetEdge } from './edge';
export { INTERACTIVE_SELECTOR, isInsideRegion, isInteractiveTarget, shouldActivate } from './gestureArbiter';
export type { ActivationInput, ScrollRegion } from './gestureArbiter';
export { GestureTracker } from './gestureTracker';
export { useSheetGesture } from './useSheetGesture';
export type { SheetGestureOptions } from './useSheetGesture';
export { chromeHeight, resolveTuning, SHEET_DEFAULTS } from './config';
export type { SheetTuning } from './config';
export { SheetConfigurationError } from './errors';
export type { SheetErrorCode } from './errors';
export { getLogLevel, logger, setLogLevel } from './logger';
export type { LogLevel } from './logger';
