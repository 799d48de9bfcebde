import type { Army, Square, Team } from "../types.ts";
import { PIECE_KINDS, opponentTeam, teamArmies, teamOf } from "../types.ts";
import { hasBit } from "./bitboard.ts";
import { kindDestinations, pawnMoves } from "./movegen.ts";
import type { Game } from "./state.ts";

/** Frozen armies attack nothing. Pawns attack only along their capture diagonals. */
export function isSquareAttackedByArmy(game: Game, square: Square, army: Army): boolean {
  if (game.state.frozen[army]) return false;
  const { board } = game;
  for (const kind of PIECE_KINDS) {
    if (board.byArmyKind[army][kind] === 0n) continue;
    const reach = kind === "P" ? pawnMoves(board, army).attacks : kindDestinations(board, army, kind);
    if (hasBit(reach, square)) return true;
  }
  return false;
}

export function isSquareAttackedByTeam(game: Game, square: Square, team: Team): boolean {
  return teamArmies(team).some((army) => isSquareAttackedByArmy(game, square, army));
}

/** False once the army's king has been captured. */
export function isKingInCheck(game: Game, army: Army): boolean {
  const king = game.state.kingSquares[army];
  if (king === null) return false;
  return isSquareAttackedByTeam(game, king, opponentTeam(teamOf(army)));
}
