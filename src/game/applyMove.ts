import type { Army, PieceKind, Square } from "../types.ts";
import { ARMY_NAME, PIECE_NAME } from "../types.ts";
import { movePiece, pieceAt, removePiece } from "./board.ts";
import { squareName } from "./coords.ts";
import { advanceToNextArmy, updateAllStalemates } from "./endTurn.ts";
import { generateLegalMoves, mustMoveKing } from "./legalMoves.ts";
import type { ApplyMoveResult, MoveErrorCode } from "./moveTypes.ts";
import { canPromoteAt, promotePawn } from "./promote.ts";
import type { PromotionTarget } from "./promote.ts";
import type { Game } from "./state.ts";
import { currentArmy, syncWithBoard } from "./state.ts";
import { captureKing, seizeThroneAt } from "./throne.ts";

function reject(code: MoveErrorCode, message: string): ApplyMoveResult {
  return { ok: false, code, message };
}

/**
 * Validate and play one move for `army`, mutating `game` in place.
 * A rejected move leaves the game exactly as it was.
 *
 * After the move: captured kings freeze their army, a king reaching its
 * ally's throne seizes that army, pawns in their promotion zone promote,
 * stalemate flags are recomputed and the turn passes to the next army able
 * to play.
 */
export function applyMove(
  game: Game,
  army: Army,
  from: Square,
  to: Square,
  promotion?: PieceKind
): ApplyMoveResult {
  const name = ARMY_NAME[army];
  if (game.state.frozen[army]) return reject("ARMY_FROZEN", `${name} is frozen`);
  if (army !== currentArmy(game)) return reject("WRONG_TURN", `It is not ${name}'s turn`);

  const mover = pieceAt(game.board, from);
  if (!mover) return reject("NO_PIECE_AT_SOURCE", "No piece on source square");
  if (mover.army !== army) {
    return reject("FOREIGN_PIECE", "Source square does not belong to the current army");
  }

  const target = pieceAt(game.board, to);
  if (target && target.army === army) return reject("SELF_CAPTURE", "Cannot capture own piece");

  if (promotion === "P" || promotion === "K") {
    return reject("INVALID_PROMOTION_TARGET", `Cannot promote to ${PIECE_NAME[promotion]}`);
  }

  const move = generateLegalMoves(game, army).find((m) => m.from === from && m.to === to);
  if (!move) {
    if (mover.piece !== "K" && mustMoveKing(game, army)) {
      return reject("KING_MUST_MOVE", "King must move while in check");
    }
    return reject("ILLEGAL_DESTINATION", "Destination is not a legal move");
  }

  // Commit.
  const { board } = game;
  if (move.kind === "capture") {
    if (move.captured.piece === "K") captureKing(game, move.captured.army);
    else removePiece(board, move.captured.army, move.captured.piece, to);
  }

  movePiece(board, army, move.piece, from, to);
  if (move.piece === "K") {
    game.state.kingSquares[army] = to;
    seizeThroneAt(game, army, to);
  }

  let promotedTo: PromotionTarget | undefined;
  if (move.piece === "P" && canPromoteAt(board, army, to)) {
    promotedTo = promotePawn(board, army, to, promotion)?.promotedTo;
  }

  syncWithBoard(game.state, board);
  updateAllStalemates(game);
  advanceToNextArmy(game);

  const message = `${name} moved ${PIECE_NAME[move.piece]} to ${squareName(to)}`;
  return promotedTo ? { ok: true, move, promotedTo, message } : { ok: true, move, message };
}
