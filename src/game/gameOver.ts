import type { Team } from "../types.ts";
import { TEAM_NAME, teamArmies } from "../types.ts";
import type { Game } from "./state.ts";

export function kingsAlive(game: Game, team: Team): number {
  return teamArmies(team).filter((army) => game.state.kingSquares[army] !== null).length;
}

/** The team that still has a king while the other has none. */
export function winningTeam(game: Game): Team | null {
  const air = kingsAlive(game, "air");
  const earth = kingsAlive(game, "earth");
  if (air > 0 && earth === 0) return "air";
  if (earth > 0 && air === 0) return "earth";
  return null;
}

/** No kings anywhere, or both kings of one team against none of the other. */
export function isDraw(game: Game): boolean {
  const air = kingsAlive(game, "air");
  const earth = kingsAlive(game, "earth");
  if (air === 0 && earth === 0) return true;
  return (air === 2 && earth === 0) || (earth === 2 && air === 0);
}

export interface Outcome {
  winner: Team | null;
  draw: boolean;
  reason: string | null;
}

/**
 * Check whether the game has ended. A decisive result takes precedence over
 * the draw rule when both apply.
 */
export function getOutcome(game: Game): Outcome {
  const winner = winningTeam(game);
  if (winner) {
    const loser: Team = winner === "air" ? "earth" : "air";
    return { winner, draw: false, reason: `${TEAM_NAME[winner]} wins — ${TEAM_NAME[loser]} has no kings left` };
  }
  if (isDraw(game)) return { winner: null, draw: true, reason: "Draw — no kings left on the board" };
  return { winner: null, draw: false, reason: null };
}
