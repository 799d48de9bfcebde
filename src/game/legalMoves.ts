import type { Army } from "../types.ts";
import { movePiece, removePiece, setFrozen } from "./board.ts";
import { isKingInCheck } from "./attacks.ts";
import { generatePseudoMoves } from "./movegen.ts";
import type { Move } from "./moveTypes.ts";
import type { Game } from "./state.ts";
import { cloneGame } from "./state.ts";

/**
 * Play `move` on a disposable copy of `game` and return the copy.
 * Only the board, frozen flags and king squares are updated; the turn
 * pointer and stalemate flags are left as they were.
 */
export function simulateMove(game: Game, move: Move): Game {
  const next = cloneGame(game);
  const { board, state } = next;

  if (move.kind === "capture") {
    const { army: victim, piece } = move.captured;
    removePiece(board, victim, piece, move.to);
    if (piece === "K") {
      setFrozen(board, victim, true);
      state.frozen[victim] = true;
      state.kingSquares[victim] = null;
    }
  }

  movePiece(board, move.army, move.piece, move.from, move.to);
  if (move.piece === "K") state.kingSquares[move.army] = move.to;

  return next;
}

function safeMoves(game: Game, army: Army): Move[] {
  return generatePseudoMoves(game.board, army).filter((move) => !isKingInCheck(simulateMove(game, move), army));
}

/**
 * Legal moves without regard to the stalemate flag, which is itself derived
 * from this list. A frozen army has none.
 */
export function computeLegalMoves(game: Game, army: Army): Move[] {
  if (game.state.frozen[army]) return [];
  const moves = safeMoves(game, army);
  if (!isKingInCheck(game, army)) return moves;

  // In check: if the king can step out, it must.
  const kingMoves = moves.filter((m) => m.piece === "K");
  return kingMoves.length > 0 ? kingMoves : moves;
}

export function generateLegalMoves(game: Game, army: Army): Move[] {
  if (game.state.stalemated[army]) return [];
  return computeLegalMoves(game, army);
}

/** True when `army` is in check and at least one king move gets it out. */
export function mustMoveKing(game: Game, army: Army): boolean {
  if (game.state.frozen[army] || !isKingInCheck(game, army)) return false;
  return safeMoves(game, army).some((m) => m.piece === "K");
}
