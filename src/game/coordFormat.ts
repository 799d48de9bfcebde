import type { Army, PieceKind, Square } from "../types.ts";
import { isArmy, isPieceKind } from "../types.ts";
import { parseSquare, squareName } from "./coords.ts";
import type { Move } from "./moveTypes.ts";

export interface MoveText {
  /** Absent when the text names no army; callers fall back to the army to move. */
  army?: Army;
  from: Square;
  to: Square;
  promotion?: PieceKind;
}

const MOVE_TEXT_RE =
  /^(?:(?<army>[a-z]+)\s*:\s*)?(?<from>[a-h][1-8])\s*[-x]\s*(?<to>[a-h][1-8])(?:\s*=\s*(?<promo>[a-z]))?$/;

/**
 * Parse `"blue: e2-e3"`, `"e5xf6"` or `"blue: e7-e8=N"`.
 * Throws on anything else.
 */
export function parseMoveText(text: string): MoveText {
  const match = MOVE_TEXT_RE.exec(text.trim().toLowerCase());
  if (!match || !match.groups) throw new Error(`Invalid move text: ${text}`);
  const { army, from, to, promo } = match.groups;

  const out: MoveText = { from: parseSquare(from), to: parseSquare(to) };
  if (army !== undefined) {
    if (!isArmy(army)) throw new Error(`Unknown army: ${army}`);
    out.army = army;
  }
  if (promo !== undefined) {
    const kind = promo.toUpperCase();
    if (!isPieceKind(kind)) throw new Error(`Unknown piece: ${promo}`);
    out.promotion = kind;
  }
  return out;
}

export function formatMove(move: Move, promotedTo?: PieceKind): string {
  const sep = move.kind === "capture" ? "x" : "-";
  const base = `${squareName(move.from)}${sep}${squareName(move.to)}`;
  return promotedTo ? `${base}=${promotedTo}` : base;
}
