import type { Bitboard, Square } from "../types.ts";

export const EMPTY: Bitboard = 0n;
export const FULL_BOARD: Bitboard = 0xffff_ffff_ffff_ffffn;

export const SQUARE_BITS: readonly Bitboard[] = Object.freeze(
  Array.from({ length: 64 }, (_, idx) => 1n << BigInt(idx))
);

export const bit = (square: Square): Bitboard => SQUARE_BITS[square] ?? 0n;

/** True when `bb` is non-negative and sets no bit above square 63. */
export function fitsBoard(bb: Bitboard): boolean {
  return bb >= 0n && bb <= FULL_BOARD;
}

export function hasBit(bb: Bitboard, square: Square): boolean {
  return (bb & bit(square)) !== 0n;
}

/** Complement restricted to the 64 board squares (bigint `~` is unbounded). */
export function complement(bb: Bitboard): Bitboard {
  return ~bb & FULL_BOARD;
}

export function popCount(bb: Bitboard): number {
  let n = 0;
  let rest = bb;
  while (rest !== 0n) {
    rest &= rest - 1n;
    n++;
  }
  return n;
}

/** Index of the highest set bit (leading-zero scan). Requires bb > 0. */
export function msb(bb: Bitboard): Square {
  return bb.toString(2).length - 1;
}

/** Index of the lowest set bit (trailing-zero scan). Requires bb > 0. */
export function lsb(bb: Bitboard): Square {
  return msb(bb & -bb);
}

/** Squares of `bb` in increasing order. */
export function squaresOf(bb: Bitboard): Square[] {
  const out: Square[] = [];
  let rest = bb;
  while (rest !== 0n) {
    out.push(lsb(rest));
    rest &= rest - 1n;
  }
  return out;
}

export function fromSquares(squares: Iterable<Square>): Bitboard {
  let bb = 0n;
  for (const sq of squares) bb |= bit(sq);
  return bb;
}
