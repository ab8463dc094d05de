'use client';

import { useEffect, useRef, useState, type RefObject } from 'react';
import type { DragController, DragOutput } from './dragController';
import { isInsideRegion, isInteractiveTarget, shouldActivate, type ScrollRegion } from './gestureArbiter';
import { GestureTracker } from './gestureTracker';
import { logger } from './logger';
import { fullSize } from './sizeSpec';

export const SCROLL_REGION_SELECTOR = '[data-sheet-scroll="true"]';

interface PointerInput {
  target: EventTarget | null;
  clientX: number;
  clientY: number;
  /** Pointer id, or `Touch.identifier` for touch input. */
  pointerId: number;
  pointerType: 'touch' | 'mouse';
  /** Only pointer events can be captured. */
  capturable: boolean;
  preventDefault: () => void;
}

export interface SheetGestureOptions {
  panelRef: RefObject<HTMLElement>;
  controller: DragController;
  active: boolean;
  keyboardOpen: boolean;
  onOutput: (output: DragOutput) => void;
}

function readScrollRegion(panel: HTMLElement): ScrollRegion | null {
  const body = panel.querySelector<HTMLElement>(SCROLL_REGION_SELECTOR);
  if (!body) return null;
  const rect = body.getBoundingClientRect();
  return { top: rect.top, height: rect.height, scrollOffset: body.scrollTop };
}

/**
 * Wires pointer and touch input on the panel to the drag controller. The
 * arbiter is consulted once, when vertical travel first passes the start
 * threshold; a rejected gesture stays rejected until the pointer lifts.
 */
export function useSheetGesture({ panelRef, controller, active, keyboardOpen, onOutput }: SheetGestureOptions) {
  const [isDragging, setIsDragging] = useState(false);
  const outputRef = useRef(onOutput);
  const keyboardRef = useRef(keyboardOpen);

  useEffect(() => {
    outputRef.current = onOutput;
    keyboardRef.current = keyboardOpen;
  }, [onOutput, keyboardOpen]);

  useEffect(() => {
    if (!active) return;
    const node = panelRef.current;
    if (!node) return;
    const panel: HTMLElement = node;

    const ref = {
      tracker: null as GestureTracker | null,
      pointerId: 0,
      startX: 0,
      startY: 0,
      pointerType: 'touch' as 'touch' | 'mouse',
      startedOnControl: false,
      committed: false,
      ignored: false,
    };

    const emit = (output: DragOutput) => outputRef.current(output);

    function reset() {
      ref.tracker = null;
      ref.committed = false;
      ref.ignored = false;
      ref.startedOnControl = false;
      setIsDragging(false);
    }

    // Only the pointer that started the gesture may move or end it
    const isOtherPointer = (e: PointerInput) => ref.tracker !== null && e.pointerId !== ref.pointerId;

    function onPointerDown(e: PointerInput) {
      if (ref.tracker) return;
      const target = e.target instanceof Element ? e.target : null;
      ref.tracker = new GestureTracker(e.clientX, e.clientY, performance.now());
      ref.pointerId = e.pointerId;
      ref.startX = e.clientX;
      ref.startY = e.clientY;
      ref.pointerType = e.pointerType;
      ref.startedOnControl = isInteractiveTarget(target);
      ref.ignored = false;
    }

    function commit(e: PointerInput, tracker: GestureTracker) {
      const touchPoint = { x: ref.startX, y: ref.startY };
      const scrollRegion = readScrollRegion(panel);
      const activate = shouldActivate({
        touchPoint,
        scrollRegion,
        velocity: tracker.velocity,
        currentHeight: controller.preferredHeight,
        maxHeight: controller.snapSet.maxHeight,
        fullHeight: controller.heightOf(fullSize()),
        edge: controller.edge,
        startedOnControl: ref.startedOnControl,
      });

      if (!activate) {
        ref.ignored = true;
        logger.debug('gesture left to content', { startedOnControl: ref.startedOnControl });
        return;
      }

      if (keyboardRef.current && (!scrollRegion || !isInsideRegion(touchPoint, scrollRegion))) {
        const focused = document.activeElement;
        if (focused instanceof HTMLElement) focused.blur();
      }

      ref.committed = true;
      if (e.capturable && typeof panel.setPointerCapture === 'function') {
        try {
          panel.setPointerCapture(e.pointerId);
        } catch (error) {
          logger.debug('pointer capture unavailable', { error });
        }
      }
      const rendered = panel.getBoundingClientRect().height;
      setIsDragging(true);
      emit(controller.handle(tracker.began(), rendered > 0 ? rendered : undefined));
    }

    function onPointerMove(e: PointerInput) {
      const tracker = ref.tracker;
      if (!tracker || ref.ignored || isOtherPointer(e)) return;

      const sample = tracker.move(e.clientX, e.clientY, performance.now());

      if (!ref.committed) {
        const threshold = ref.pointerType === 'mouse'
          ? controller.tuning.mouseStartThreshold
          : controller.tuning.touchStartThreshold;
        if (Math.abs(sample.translation.y) < threshold) return;
        commit(e, tracker);
        return;
      }

      emit(controller.handle(sample));
      e.preventDefault();
    }

    function onPointerUp(e: PointerInput) {
      if (isOtherPointer(e)) return;
      const tracker = ref.tracker;
      if (e.capturable && typeof panel.hasPointerCapture === 'function' && panel.hasPointerCapture(e.pointerId)) {
        panel.releasePointerCapture(e.pointerId);
      }
      if (tracker && ref.committed) {
        emit(controller.handle(tracker.end(e.clientX, e.clientY, performance.now())));
      }
      reset();
    }

    function onPointerCancel(e: PointerInput) {
      if (isOtherPointer(e)) return;
      const tracker = ref.tracker;
      if (tracker && ref.committed) {
        emit(controller.handle(tracker.cancel()));
      }
      reset();
    }

    const fromPointer = (e: PointerEvent): PointerInput => ({
      target: e.target,
      clientX: e.clientX,
      clientY: e.clientY,
      pointerId: e.pointerId,
      pointerType: e.pointerType === 'mouse' ? 'mouse' : 'touch',
      capturable: true,
      preventDefault: () => e.preventDefault(),
    });

    const fromTouch = (e: TouchEvent, touch: Touch): PointerInput => ({
      target: e.target,
      clientX: touch.clientX,
      clientY: touch.clientY,
      pointerId: touch.identifier,
      pointerType: 'touch',
      capturable: false,
      preventDefault: () => e.preventDefault(),
    });

    const handlePointerDown = (e: PointerEvent) => onPointerDown(fromPointer(e));
    const handlePointerMove = (e: PointerEvent) => onPointerMove(fromPointer(e));
    const handlePointerUp = (e: PointerEvent) => onPointerUp(fromPointer(e));
    const handlePointerCancel = (e: PointerEvent) => onPointerCancel(fromPointer(e));

    function trackedTouch(list: TouchList) {
      for (let i = 0; i < list.length; i++) {
        const touch = list.item(i);
        if (touch && (!ref.tracker || touch.identifier === ref.pointerId)) return touch;
      }
      return null;
    }

    // Touch input only where pointer events are missing, so one touch is never handled twice
    const touchFallback = typeof window.PointerEvent !== 'function';

    function handleTouchStart(e: TouchEvent) {
      if (e.touches.length !== 1) return;
      onPointerDown(fromTouch(e, e.touches[0]));
    }

    function handleTouchMove(e: TouchEvent) {
      const touch = trackedTouch(e.changedTouches);
      if (touch) onPointerMove(fromTouch(e, touch));
    }

    function handleTouchEnd(e: TouchEvent) {
      const touch = trackedTouch(e.changedTouches);
      if (touch) onPointerUp(fromTouch(e, touch));
    }

    function handleTouchCancel(e: TouchEvent) {
      const touch = trackedTouch(e.changedTouches);
      if (touch) onPointerCancel(fromTouch(e, touch));
    }

    panel.addEventListener('pointerdown', handlePointerDown);
    document.addEventListener('pointermove', handlePointerMove);
    document.addEventListener('pointerup', handlePointerUp);
    document.addEventListener('pointercancel', handlePointerCancel);
    if (touchFallback) {
      panel.addEventListener('touchstart', handleTouchStart, { passive: false });
      document.addEventListener('touchmove', handleTouchMove, { passive: false });
      document.addEventListener('touchend', handleTouchEnd, { passive: false });
      document.addEventListener('touchcancel', handleTouchCancel);
    }

    return () => {
      // A drag still in flight when the listeners go is cancelled
      if (ref.tracker && ref.committed) {
        emit(controller.handle(ref.tracker.cancel()));
      }
      reset();
      panel.removeEventListener('pointerdown', handlePointerDown);
      document.removeEventListener('pointermove', handlePointerMove);
      document.removeEventListener('pointerup', handlePointerUp);
      document.removeEventListener('pointercancel', handlePointerCancel);
      if (touchFallback) {
        panel.removeEventListener('touchstart', handleTouchStart);
        document.removeEventListener('touchmove', handleTouchMove);
        document.removeEventListener('touchend', handleTouchEnd);
        document.removeEventListener('touchcancel', handleTouchCancel);
      }
    };
  }, [panelRef, controller, active]);

  return { isDragging };
}
