import type { Army, Bitboard, Square } from "../types.ts";
import { perArmy } from "../types.ts";
import { bit } from "./bitboard.ts";
import { fileOf, inBounds, makeSquare, rankOf } from "./coords.ts";

/*
 * Static lookup tables, built once when this module loads and frozen.
 * Every game shares them.
 */

export type Direction = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const UP: Direction = 0;
export const UP_RIGHT: Direction = 1;
export const RIGHT: Direction = 2;
export const DOWN_RIGHT: Direction = 3;
export const DOWN: Direction = 4;
export const DOWN_LEFT: Direction = 5;
export const LEFT: Direction = 6;
export const UP_LEFT: Direction = 7;

const DIRECTION_DELTAS: Record<Direction, { df: number; dr: number }> = {
  0: { df: 0, dr: 1 },
  1: { df: 1, dr: 1 },
  2: { df: 1, dr: 0 },
  3: { df: 1, dr: -1 },
  4: { df: 0, dr: -1 },
  5: { df: -1, dr: -1 },
  6: { df: -1, dr: 0 },
  7: { df: -1, dr: 1 },
};

export const ROOK_DIRECTIONS: readonly Direction[] = [UP, RIGHT, DOWN, LEFT];
export const BISHOP_DIRECTIONS: readonly Direction[] = [UP_RIGHT, DOWN_RIGHT, DOWN_LEFT, UP_LEFT];

/** Directions along which square indices grow; the nearest blocker is the lowest set bit. */
export function isIncreasing(dir: Direction): boolean {
  return dir === UP || dir === UP_RIGHT || dir === RIGHT || dir === UP_LEFT;
}

function stepTable(deltas: ReadonlyArray<{ df: number; dr: number }>): readonly Bitboard[] {
  const table: Bitboard[] = [];
  for (let sq = 0; sq < 64; sq++) {
    const f = fileOf(sq);
    const r = rankOf(sq);
    let mask = 0n;
    for (const { df, dr } of deltas) {
      if (inBounds(f + df, r + dr)) mask |= bit(makeSquare(f + df, r + dr));
    }
    table.push(mask);
  }
  return Object.freeze(table);
}

function rayMask(from: Square, dir: Direction): Bitboard {
  const { df, dr } = DIRECTION_DELTAS[dir];
  let f = fileOf(from) + df;
  let r = rankOf(from) + dr;
  let mask = 0n;
  while (inBounds(f, r)) {
    mask |= bit(makeSquare(f, r));
    f += df;
    r += dr;
  }
  return mask;
}

export const KING_STEPS: readonly Bitboard[] = stepTable(Object.values(DIRECTION_DELTAS));

export const KNIGHT_STEPS: readonly Bitboard[] = stepTable([
  { df: 1, dr: 2 },
  { df: -1, dr: 2 },
  { df: 2, dr: 1 },
  { df: -2, dr: 1 },
  { df: 1, dr: -2 },
  { df: -1, dr: -2 },
  { df: 2, dr: -1 },
  { df: -2, dr: -1 },
]);

/** Two-square leap destinations, orthogonal and diagonal. */
export const QUEEN_LEAPS: readonly Bitboard[] = stepTable(
  Object.values(DIRECTION_DELTAS).map(({ df, dr }) => ({ df: 2 * df, dr: 2 * dr }))
);

/** RAYS[square][direction]: squares from `square` (exclusive) to the board edge. */
export const RAYS: ReadonlyArray<readonly Bitboard[]> = Object.freeze(
  Array.from({ length: 64 }, (_, sq) =>
    Object.freeze(([0, 1, 2, 3, 4, 5, 6, 7] as const).map((dir) => rayMask(sq, dir)))
  )
);

// Blue advances up the ranks, Red down; Black advances up the files, Yellow down.
const PAWN_FORWARD: Record<Army, { df: number; dr: number }> = {
  blue: { df: 0, dr: 1 },
  red: { df: 0, dr: -1 },
  black: { df: 1, dr: 0 },
  yellow: { df: -1, dr: 0 },
};

export const PAWN_PUSHES: Readonly<Record<Army, readonly Bitboard[]>> = perArmy((army) =>
  stepTable([PAWN_FORWARD[army]])
);

/** The two forward diagonals of each pawn. */
export const PAWN_ATTACKS: Readonly<Record<Army, readonly Bitboard[]>> = perArmy((army) => {
  const { df, dr } = PAWN_FORWARD[army];
  return df === 0
    ? stepTable([{ df: -1, dr }, { df: 1, dr }])
    : stepTable([{ df, dr: -1 }, { df, dr: 1 }]);
});
