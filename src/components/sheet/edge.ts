export type SheetEdge = 'bottom' | 'top';

/**
 * Maps a screen-space vertical value onto the growth axis, where positive
 * always means "taller sheet". Bottom sheets grow as the pointer moves up.
 */
export function growth(y: number, edge: SheetEdge) {
  return edge === 'bottom' ? 0 - y : y;
}

/** Signed translateY for a non-negative overscroll past the minimum height. */
export function toScreenOffset(amount: number, edge: SheetEdge) {
  if (amount === 0) return 0;
  return edge === 'bottom' ? amount : -amount;
}
