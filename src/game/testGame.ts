import type { Army, PieceKind } from "../types.ts";
import { ARMIES, PIECE_KINDS } from "../types.ts";
import type { BoardState, Placement } from "./board.ts";
import { createBoard } from "./board.ts";
import { fromSquares } from "./bitboard.ts";
import { parseSquare } from "./coords.ts";
import type { Game } from "./state.ts";
import { DEFAULT_CONFIG, createGame } from "./state.ts";

/** Square names per army and kind, e.g. `{ blue: { K: ["e1"], P: ["e2"] } }`. */
export type Layout = Partial<Record<Army, Partial<Record<PieceKind, string[]>>>>;

export function boardFrom(layout: Layout): BoardState {
  const placements: Placement[] = [];
  for (const army of ARMIES) {
    for (const piece of PIECE_KINDS) {
      const names = layout[army]?.[piece];
      if (names) placements.push({ army, piece, squares: fromSquares(names.map(parseSquare)) });
    }
  }
  return createBoard(placements);
}

/** A game on the default thrones and zones, Blue to move unless `turnOrder` says otherwise. */
export function gameFrom(layout: Layout, turnOrder: readonly Army[] = DEFAULT_CONFIG.turnOrder): Game {
  return createGame(boardFrom(layout), { ...DEFAULT_CONFIG, turnOrder });
}
