import type { Army, PieceKind, Square } from "../types.ts";
import type { BoardState } from "./board.ts";
import { demotePieceToPawn, pieceCounts, refreshOccupancy } from "./board.ts";
import { bit, complement, hasBit } from "./bitboard.ts";

export type PromotionTarget = "Q" | "R" | "B" | "N";

const PROMOTION_TARGETS: readonly PromotionTarget[] = ["Q", "R", "B", "N"];

export function isPromotionTarget(kind: PieceKind): kind is PromotionTarget {
  return kind === "Q" || kind === "R" || kind === "B" || kind === "N";
}

export function canPromoteAt(board: BoardState, army: Army, square: Square): boolean {
  return hasBit(board.promotionZones[army], square);
}

/**
 * A pawn is privileged while its army still has a king and at least one pawn,
 * but no more than one piece among Queen, Bishop, Knight and Rook.
 */
export function isPrivilegedPawn(board: BoardState, army: Army): boolean {
  const c = pieceCounts(board, army);
  return c.K >= 1 && c.P >= 1 && c.Q + c.B + c.N + c.R <= 1;
}

export function promotionTargets(board: BoardState, army: Army): readonly PromotionTarget[] {
  return isPrivilegedPawn(board, army) ? PROMOTION_TARGETS : ["Q"];
}

export interface PromotionResult {
  promotedTo: PromotionTarget;
  /** Square of the existing piece that was turned back into a pawn, if any. */
  demoted: Square | null;
}

/**
 * Promote the pawn of `army` standing on `square`. Returns null when there is
 * no such pawn. Ordinary pawns always become Queens; privileged pawns take the
 * requested kind, and an existing piece of that kind is demoted first.
 */
export function promotePawn(
  board: BoardState,
  army: Army,
  square: Square,
  requested?: PieceKind
): PromotionResult | null {
  if (requested !== undefined && !isPromotionTarget(requested)) {
    throw new Error(`Cannot promote to ${requested}`);
  }
  const masks = board.byArmyKind[army];
  if (!hasBit(masks.P, square)) return null;

  if (!isPrivilegedPawn(board, army)) {
    masks.P &= complement(bit(square));
    masks.Q |= bit(square);
    refreshOccupancy(board);
    return { promotedTo: "Q", demoted: null };
  }

  const target = requested ?? "Q";
  const demoted = masks[target] !== 0n ? demotePieceToPawn(board, army, target) : null;
  masks.P &= complement(bit(square));
  masks[target] |= bit(square);
  refreshOccupancy(board);
  return { promotedTo: target, demoted };
}
