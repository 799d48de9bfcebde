import type { Army, Square } from "../types.ts";
import { ARMY_NAME, allyOf } from "../types.ts";
import { clearSquare, pieceAt, placePiece, removePiece, setController, setFrozen } from "./board.ts";
import { updateAllStalemates } from "./endTurn.ts";
import type { Game } from "./state.ts";

export function freezeArmy(game: Game, army: Army): void {
  setFrozen(game.board, army, true);
  game.state.frozen[army] = true;
}

export function unfreezeArmy(game: Game, army: Army): void {
  setFrozen(game.board, army, false);
  game.state.frozen[army] = false;
}

/** Remove the army's king from its cached square and freeze the army. */
export function captureKing(game: Game, army: Army): void {
  const square = game.state.kingSquares[army];
  if (square !== null) removePiece(game.board, army, "K", square);
  freezeArmy(game, army);
  game.state.kingSquares[army] = null;
}

/**
 * A king standing on its ally's throne takes control of the ally's army and
 * revives it. Returns the seized army, or null when `square` is not an
 * ally's throne.
 */
export function seizeThroneAt(game: Game, army: Army, square: Square): Army | null {
  const ally = allyOf(army);
  if (!game.board.armies[ally].thrones.includes(square)) return null;
  setController(game.board, ally, game.board.armies[army].controller);
  unfreezeArmy(game, ally);
  return ally;
}

/** Put the army's king back on its first throne square, replacing whatever stood there. */
export function restoreKingToThrone(game: Game, army: Army): void {
  const throne = game.board.armies[army].thrones[0];
  clearSquare(game.board, throne);
  placePiece(game.board, army, "K", throne);
  game.state.kingSquares[army] = throne;
  unfreezeArmy(game, army);
}

export type ExchangeResult = { ok: true; message: string } | { ok: false; message: string };

/**
 * Two kingless armies get their kings back. Nothing changes unless both
 * kings are captured and neither first throne is held by another king.
 */
export function exchangePrisoners(game: Game, a: Army, b: Army): ExchangeResult {
  if (a === b) return { ok: false, message: "Prisoner exchange needs two different armies" };
  for (const army of [a, b]) {
    if (game.state.kingSquares[army] !== null) {
      return { ok: false, message: `${ARMY_NAME[army]} king has not been captured` };
    }
    const occupant = pieceAt(game.board, game.board.armies[army].thrones[0]);
    if (occupant?.piece === "K") {
      return { ok: false, message: `${ARMY_NAME[army]} throne is held by the ${ARMY_NAME[occupant.army]} king` };
    }
  }

  restoreKingToThrone(game, a);
  restoreKingToThrone(game, b);
  game.state.stalemated[a] = false;
  game.state.stalemated[b] = false;
  updateAllStalemates(game);
  return { ok: true, message: `${ARMY_NAME[a]} and ${ARMY_NAME[b]} exchanged prisoners` };
}
