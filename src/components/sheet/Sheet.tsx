'use client';

import React, { forwardRef, useCallback, useEffect, useImperativeHandle, useLayoutEffect, useRef, useState } from 'react';
import ReactDOM from 'react-dom';
import type { SheetTuning } from './config';
import { DragController, type DragOutput, type ResizeOutput } from './dragController';
import type { SheetEdge } from './edge';
import { SheetConfigurationError } from './errors';
import { DEFAULT_SIZES, describeSize, type SheetLayout, type SizeSpec } from './sizeSpec';
import { useSheetGesture } from './useSheetGesture';
import './Sheet.css';

export interface SheetInsets {
  top?: number;
  bottom?: number;
}

export interface SheetProps {
  open: boolean;
  onClose: () => void;
  sizes?: readonly SizeSpec[];
  edge?: SheetEdge;
  insets?: SheetInsets;
  tuning?: Partial<SheetTuning>;
  /** Allow resizing and swipe-to-dismiss by dragging the panel. */
  draggable?: boolean;
  dismissOnBackgroundTap?: boolean;
  dismissOnEscape?: boolean;
  /** Raise a bottom sheet above the on-screen keyboard. */
  adjustForKeyboard?: boolean;
  onWillDismiss?: () => void;
  onDidDismiss?: () => void;
  className?: string;
  backdropClassName?: string;
  panelClassName?: string;
  'aria-label'?: string;
  children: React.ReactNode;
}

export interface SheetHandle {
  setSizes: (sizes: readonly SizeSpec[], animated?: boolean) => void;
  resizeTo: (size: SizeSpec, animated?: boolean) => void;
  close: (duration?: number) => void;
}

interface PanelGeometry {
  height: number;
  offset: number;
  /** Seconds; 0 renders without a transition. */
  duration: number;
}

const bem = (block: string, modifiers: Array<string | false | undefined>) => {
  const mods = modifiers.filter(Boolean).map(m => `${block}--${m}`);
  return [block, ...mods].join(' ');
};

/** The on-screen keyboard takes its overlap out of the extent sizes resolve against. */
function measureLayout(insets: SheetInsets, keyboardInset = 0): SheetLayout {
  return {
    availableExtent: Math.max(0, window.innerHeight - keyboardInset),
    topInset: insets.top ?? 0,
    bottomInset: insets.bottom ?? 0,
  };
}

function useLockBodyScroll(active: boolean) {
  useLayoutEffect(() => {
    if (!active) return;
    const prev = document.documentElement.style.overflow;
    document.documentElement.style.overflow = 'hidden';
    return () => { document.documentElement.style.overflow = prev; };
  }, [active]);
}

function useKeyboardInset(active: boolean) {
  const [inset, setInset] = useState(0);

  useEffect(() => {
    if (!active) return;
    const viewport = window.visualViewport;
    if (!viewport) return;

    const update = () => {
      const overlap = window.innerHeight - (viewport.height + viewport.offsetTop);
      setInset(Math.max(0, Math.round(overlap)));
    };
    update();
    viewport.addEventListener('resize', update);
    viewport.addEventListener('scroll', update);
    return () => {
      viewport.removeEventListener('resize', update);
      viewport.removeEventListener('scroll', update);
      setInset(0);
    };
  }, [active]);

  return inset;
}

export const Sheet = forwardRef<SheetHandle, SheetProps>(function Sheet({
  open,
  onClose,
  sizes = DEFAULT_SIZES,
  edge = 'bottom',
  insets = {},
  tuning,
  draggable = true,
  dismissOnBackgroundTap = true,
  dismissOnEscape = true,
  adjustForKeyboard = true,
  onWillDismiss,
  onDidDismiss,
  className,
  backdropClassName,
  panelClassName,
  'aria-label': ariaLabel,
  children,
}, ref) {
  if (React.Children.toArray(children).length === 0) {
    throw new SheetConfigurationError('E_MISSING_CONTENT', 'Sheet requires child content');
  }

  // Edge and tuning are read once; a sheet that needs another edge is a new sheet
  const [controller] = useState(() => new DragController({ edge, sizes, tuning, layout: measureLayout(insets) }));
  const panelRef = useRef<HTMLDivElement>(null);
  const [portal, setPortal] = useState<HTMLElement | null>(null);
  const [shouldRender, setShouldRender] = useState(open);
  const [isAnimating, setIsAnimating] = useState(false);
  const [isLeaving, setIsLeaving] = useState(false);
  const [geometry, setGeometry] = useState<PanelGeometry>(() => ({
    height: controller.state.actualHeight,
    offset: 0,
    duration: 0,
  }));

  const settleTimer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const dismissedRef = useRef(false);
  const wasOpenRef = useRef(false);
  const callbacks = useRef({ onClose, onWillDismiss, onDidDismiss });
  callbacks.current = { onClose, onWillDismiss, onDidDismiss };

  const clearSettleTimer = () => {
    if (settleTimer.current) {
      clearTimeout(settleTimer.current);
      settleTimer.current = null;
    }
  };

  const applyOutput = useCallback((output: DragOutput | ResizeOutput | null) => {
    if (!output) return;
    switch (output.type) {
      case 'ignored':
        return;
      case 'frame':
        clearSettleTimer();
        setGeometry({ height: output.height, offset: output.offset, duration: 0 });
        return;
      case 'revert':
      case 'settle':
      case 'resize': {
        clearSettleTimer();
        const { height, duration } = output;
        setGeometry({ height, offset: 0, duration });
        settleTimer.current = setTimeout(() => {
          settleTimer.current = null;
          controller.settleCompleted(height);
        }, duration * 1000);
        return;
      }
      case 'dismiss':
        clearSettleTimer();
        setGeometry(prev => ({ ...prev, duration: output.duration }));
        setIsLeaving(true);
        settleTimer.current = setTimeout(() => {
          settleTimer.current = null;
          dismissedRef.current = true;
          callbacks.current.onWillDismiss?.();
          callbacks.current.onClose();
        }, output.duration * 1000);
        return;
    }
  }, [controller]);

  useEffect(() => clearSettleTimer, []);

  // Create portal mount
  useEffect(() => {
    let root = document.getElementById('sheet-root');
    if (!root) {
      root = document.createElement('div');
      root.setAttribute('id', 'sheet-root');
      document.body.appendChild(root);
    }
    setPortal(root);
  }, []);

  // Open and close transitions
  useEffect(() => {
    if (open) {
      wasOpenRef.current = true;
      dismissedRef.current = false;
      setIsLeaving(false);
      setShouldRender(true);
      setGeometry({ height: controller.preferredHeight, offset: 0, duration: 0 });
      const timer = setTimeout(() => setIsAnimating(true), 16);
      return () => clearTimeout(timer);
    }

    if (!wasOpenRef.current) return;
    wasOpenRef.current = false;
    setIsAnimating(false);
    if (dismissedRef.current) {
      setShouldRender(false);
      callbacks.current.onDidDismiss?.();
      return;
    }
    // Closed by the host: slide out first, then report both notifications
    callbacks.current.onWillDismiss?.();
    const timer = setTimeout(() => {
      setShouldRender(false);
      callbacks.current.onDidDismiss?.();
    }, controller.tuning.closeDuration * 1000);
    return () => clearTimeout(timer);
  }, [open, controller]);

  const keyboardInset = useKeyboardInset(shouldRender && adjustForKeyboard && edge === 'bottom');

  // Host geometry
  const insetTop = insets.top ?? 0;
  const insetBottom = insets.bottom ?? 0;
  useEffect(() => {
    const update = () => {
      controller.updateLayout(measureLayout({ top: insetTop, bottom: insetBottom }, keyboardInset));
      if (controller.phase === 'idle') {
        setGeometry(prev => ({ ...prev, height: controller.preferredHeight, duration: 0 }));
      }
    };
    update();
    window.addEventListener('resize', update);
    window.addEventListener('orientationchange', update);
    return () => {
      window.removeEventListener('resize', update);
      window.removeEventListener('orientationchange', update);
    };
  }, [controller, insetTop, insetBottom, keyboardInset]);

  // Replacing the snap set resizes to its smallest entry
  const sizesKey = sizes.map(describeSize).join(',');
  const appliedSizes = useRef(sizesKey);
  useEffect(() => {
    if (appliedSizes.current === sizesKey) return;
    appliedSizes.current = sizesKey;
    applyOutput(controller.setSnapSet(sizes, true));
  }, [sizesKey, sizes, controller, applyOutput]);

  useImperativeHandle(ref, () => ({
    setSizes: (next, animated = true) => applyOutput(controller.setSnapSet(next, animated)),
    resizeTo: (size, animated = true) => applyOutput(controller.resizeTo(size, animated)),
    close: duration => applyOutput(controller.close(duration)),
  }), [controller, applyOutput]);

  const requestDismiss = useCallback(() => {
    applyOutput(controller.close());
  }, [controller, applyOutput]);

  // ESC to close
  useEffect(() => {
    if (!open || !dismissOnEscape) return;
    const onKey = (e: KeyboardEvent) => {
      if (e.key === 'Escape') requestDismiss();
    };
    document.addEventListener('keydown', onKey);
    return () => document.removeEventListener('keydown', onKey);
  }, [open, dismissOnEscape, requestDismiss]);

  const { isDragging } = useSheetGesture({
    panelRef,
    controller,
    active: shouldRender && portal !== null && draggable && !isLeaving,
    keyboardOpen: keyboardInset > 0,
    onOutput: applyOutput,
  });

  useLockBodyScroll(shouldRender);

  const handleBackdropClick = useCallback((e: React.MouseEvent) => {
    if (!dismissOnBackgroundTap || e.target !== e.currentTarget) return;
    requestDismiss();
  }, [dismissOnBackgroundTap, requestDismiss]);

  if (!portal || !shouldRender) return null;

  const sheetClasses = bem('sheet', [
    'mounted',
    isAnimating && !isLeaving && 'open',
    isLeaving && 'leaving',
    `edge-${edge}`,
  ]);

  const t = controller.tuning;
  const transitionFor = (duration: number) =>
    `height ${duration}s ease-out, transform ${duration}s ease-out`;

  const panelStyle: React.CSSProperties = {
    height: `${geometry.height}px`,
    transform: (() => {
      if (isLeaving) return edge === 'bottom' ? 'translateY(100%)' : 'translateY(-100%)';
      if (geometry.offset !== 0) return `translateY(${geometry.offset}px)`;
      return undefined;
    })(),
    transition: isDragging ? 'none' : geometry.duration > 0 ? transitionFor(geometry.duration) : undefined,
    bottom: edge === 'bottom' && keyboardInset > 0 ? `${keyboardInset}px` : undefined,
    willChange: isDragging ? 'transform, height' : 'auto',
  };

  const handleStyle: React.CSSProperties = {
    marginTop: `${t.handleTopInset}px`,
    marginBottom: `${t.handleBottomInset}px`,
    height: `${t.handleHeight}px`,
  };

  const pullBar = (
    <div className="sheet__pull-bar" data-testid="sheet-pull-bar">
      <div className="sheet__handle" style={handleStyle} />
    </div>
  );

  const content = (
    <div className={[sheetClasses, className].filter(Boolean).join(' ')} role="presentation" data-dragging={isDragging}>
      <div
        className={['sheet__backdrop', backdropClassName].filter(Boolean).join(' ')}
        data-testid="sheet-backdrop"
        onClick={handleBackdropClick}
        style={isLeaving ? { transitionDuration: `${geometry.duration}s` } : undefined}
      />
      <div
        ref={panelRef}
        className={['sheet__panel', panelClassName].filter(Boolean).join(' ')}
        role="dialog"
        aria-modal="true"
        aria-label={ariaLabel}
        tabIndex={-1}
        style={panelStyle}
        data-edge={edge}
        data-dragging={isDragging}
      >
        {edge === 'bottom' && pullBar}
        <div className="sheet__content">{children}</div>
        {edge === 'top' && pullBar}
      </div>
    </div>
  );

  return ReactDOM.createPortal(content, portal);
});

export interface SheetHeaderProps extends React.HTMLAttributes<HTMLDivElement> {
  children?: React.ReactNode;
}
export const SheetHeader: React.FC<SheetHeaderProps> = ({ className, ...props }) => (
  <div className={['sheet__header', className].filter(Boolean).join(' ')} {...props} />
);

export interface SheetBodyProps extends React.HTMLAttributes<HTMLDivElement> {
  children?: React.ReactNode;
  /**
   * If true, the body scrolls internally and drags that start inside it are
   * arbitrated against its scroll position.
   * @default true
   */
  scrollable?: boolean;
}
export const SheetBody: React.FC<SheetBodyProps> = ({ className, scrollable = true, ...props }) => (
  <div
    className={['sheet__body', className].filter(Boolean).join(' ')}
    data-sheet-scroll={scrollable}
    {...props}
  />
);

export default Sheet;
