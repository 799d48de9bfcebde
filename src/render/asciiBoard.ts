import type { Army, Piece } from "../types.ts";
import type { BoardState } from "../game/board.ts";
import { pieceAt } from "../game/board.ts";
import { makeSquare } from "../game/coords.ts";

// Blue and Red print upper case, Black and Yellow lower case.
const UPPER_CASE: Record<Army, boolean> = { blue: true, red: true, black: false, yellow: false };

export function pieceChar(p: Piece | null): string {
  if (!p) return ".";
  return UPPER_CASE[p.army] ? p.piece : p.piece.toLowerCase();
}

/**
 * Eight text rows, rank 8 first: `"8 r . b ..."`.
 */
export function asciiRows(board: BoardState): string[] {
  const rows: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    const cells: string[] = [];
    for (let file = 0; file < 8; file++) cells.push(pieceChar(pieceAt(board, makeSquare(file, rank))));
    rows.push(`${rank + 1} ${cells.join(" ")}`.trimEnd());
  }
  return rows;
}

export function asciiBoard(board: BoardState): string {
  return [...asciiRows(board), "  a b c d e f g h"].join("\n");
}
