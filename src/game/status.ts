import type { Army, Square } from "../types.ts";
import { ARMIES, ARMY_NAME, PIECE_NAME, TEAM_NAME } from "../types.ts";
import { isKingInCheck } from "./attacks.ts";
import { pieceAt } from "./board.ts";
import { squareName } from "./coords.ts";
import { getOutcome } from "./gameOver.ts";
import { generateLegalMoves } from "./legalMoves.ts";
import type { Game } from "./state.ts";
import { currentArmy } from "./state.ts";

export type ArmyStatus = "Frozen" | "Stalemated" | "In Check" | "Active";

export function isArmyFrozen(game: Game, army: Army): boolean {
  return game.state.frozen[army];
}

export function isArmyStalemated(game: Game, army: Army): boolean {
  return game.state.stalemated[army];
}

export function armyStatus(game: Game, army: Army): ArmyStatus {
  if (isArmyFrozen(game, army)) return "Frozen";
  if (isArmyStalemated(game, army)) return "Stalemated";
  if (isKingInCheck(game, army)) return "In Check";
  return "Active";
}

function listArmies(armies: readonly Army[]): string {
  return armies.length === 0 ? "None" : armies.map((a) => ARMY_NAME[a]).join(", ");
}

/** One-line overview, e.g. `"Turn: Red | Frozen: Blue | Stalemated: None"`. */
export function statusSummary(game: Game): string {
  const parts = [
    `Turn: ${ARMY_NAME[currentArmy(game)]}`,
    `Frozen: ${listArmies(ARMIES.filter((a) => isArmyFrozen(game, a)))}`,
    `Stalemated: ${listArmies(ARMIES.filter((a) => isArmyStalemated(game, a)))}`,
  ];
  const outcome = getOutcome(game);
  if (outcome.winner) parts.push(`Winner: ${TEAM_NAME[outcome.winner]} team`);
  else if (outcome.draw) parts.push("Draw");
  return parts.join(" | ");
}

/**
 * Human-readable description of a square: the piece on it, its army's status
 * and the legal moves from there.
 */
export function describeSquare(game: Game, square: Square): string {
  const name = squareName(square);
  const piece = pieceAt(game.board, square);
  if (!piece) return `${name}: empty`;

  const header = `${name}: ${ARMY_NAME[piece.army]} ${PIECE_NAME[piece.piece]} (${armyStatus(game, piece.army)})`;
  const moves = generateLegalMoves(game, piece.army)
    .filter((m) => m.from === square)
    .map((m) =>
      m.kind === "capture"
        ? `${squareName(m.to)} (captures ${ARMY_NAME[m.captured.army]} ${PIECE_NAME[m.captured.piece]})`
        : squareName(m.to)
    );
  return `${header}\nMoves: ${moves.length === 0 ? "none" : moves.join(", ")}`;
}
