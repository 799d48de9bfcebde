import type { Army, Piece, PieceKind, Square } from "../types.ts";

export interface QuietMove {
  kind: "move";
  army: Army;
  piece: PieceKind;
  from: Square;
  to: Square;
}

export interface CaptureMove {
  kind: "capture";
  army: Army;
  piece: PieceKind;
  from: Square;
  to: Square;
  captured: Piece;
}

export type Move = QuietMove | CaptureMove;

export type MoveErrorCode =
  | "WRONG_TURN"
  | "ARMY_FROZEN"
  | "NO_PIECE_AT_SOURCE"
  | "FOREIGN_PIECE"
  | "SELF_CAPTURE"
  | "INVALID_PROMOTION_TARGET"
  | "KING_MUST_MOVE"
  | "ILLEGAL_DESTINATION";

export type ApplyMoveResult =
  | { ok: true; move: Move; promotedTo?: PieceKind; message: string }
  | { ok: false; code: MoveErrorCode; message: string };
