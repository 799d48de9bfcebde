import type { Army } from "../types.ts";
import { isKingInCheck } from "./attacks.ts";
import { computeLegalMoves } from "./legalMoves.ts";
import type { Game } from "./state.ts";
import { currentArmy } from "./state.ts";

/**
 * An army is stalemated when it is neither frozen nor in check and has no
 * legal move. Frozen armies are never flagged.
 */
export function updateStalemateStatus(game: Game, army: Army): boolean {
  const stalemated =
    !game.state.frozen[army] && !isKingInCheck(game, army) && computeLegalMoves(game, army).length === 0;
  game.state.stalemated[army] = stalemated;
  return stalemated;
}

export function updateAllStalemates(game: Game): void {
  for (const army of game.config.armies) updateStalemateStatus(game, army);
}

function canTakeTurn(game: Game, army: Army): boolean {
  if (game.state.frozen[army] || game.state.stalemated[army]) return false;
  // An army in check with no way out would otherwise hold the turn forever.
  return computeLegalMoves(game, army).length > 0;
}

/**
 * Move the turn pointer to the next army that can play, walking the turn
 * order at most once. When nobody can play the pointer comes back to where
 * it started.
 */
export function advanceToNextArmy(game: Game): Army {
  const len = game.config.turnOrder.length;
  for (let step = 0; step < len; step++) {
    game.state.currentTurnIndex = (game.state.currentTurnIndex + 1) % len;
    if (canTakeTurn(game, currentArmy(game))) break;
  }
  return currentArmy(game);
}
