import type { Army, PlayerId, Square } from "../types.ts";
import { ARMIES, ARMY_NAME, PIECE_KINDS, PIECE_NAME, perArmy } from "../types.ts";
import type { ArraySpec } from "../arrays/arrayTypes.ts";
import type { BoardState } from "./board.ts";
import { fitsBoard } from "./bitboard.ts";
import { cloneBoard, createBoard, findOverlap, kingSquare, refreshOccupancy } from "./board.ts";
import { isSquare, squareName } from "./coords.ts";

export interface GameConfig {
  armies: readonly Army[];
  /** A permutation of the four armies. */
  turnOrder: readonly Army[];
  /** Initial controller per army; the live value sits on the board and moves with throne seizures. */
  controllers: Readonly<Record<Army, PlayerId>>;
}

export interface GameState {
  currentTurnIndex: number;
  /** Mirrors `board.armies[army].frozen`. */
  frozen: Record<Army, boolean>;
  /** Cached king squares; null once the king is captured. */
  kingSquares: Record<Army, Square | null>;
  stalemated: Record<Army, boolean>;
}

export interface Game {
  board: BoardState;
  config: GameConfig;
  state: GameState;
}

export const DEFAULT_CONFIG: GameConfig = {
  armies: ARMIES,
  turnOrder: ["blue", "red", "black", "yellow"],
  controllers: { blue: 1, black: 1, red: 2, yellow: 2 },
};

export function createGameState(): GameState {
  return {
    currentTurnIndex: 0,
    frozen: perArmy(() => false),
    kingSquares: perArmy(() => null),
    stalemated: perArmy(() => false),
  };
}

/** Copy frozen flags and king squares from the board and clear stalemate flags. */
export function syncWithBoard(state: GameState, board: BoardState): void {
  for (const army of ARMIES) {
    state.frozen[army] = board.armies[army].frozen;
    state.kingSquares[army] = kingSquare(board, army);
    state.stalemated[army] = false;
  }
}

/**
 * Rebuild everything derived from the authoritative fields: board occupancy,
 * frozen mirrors and king squares. Turn index and stalemate flags are kept.
 * Required after loading a snapshot or editing `byArmyKind` directly.
 */
export function refreshDerivedState(game: Game): void {
  refreshOccupancy(game.board);
  for (const army of ARMIES) {
    game.state.frozen[army] = game.board.armies[army].frozen;
    game.state.kingSquares[army] = kingSquare(game.board, army);
  }
}

export function validateConfig(config: GameConfig): void {
  if (config.armies.length !== ARMIES.length || !ARMIES.every((army) => config.armies.includes(army))) {
    throw new Error(`Invalid army list: ${config.armies.join(", ")}`);
  }
  const order = config.turnOrder;
  if (order.length !== ARMIES.length || new Set(order).size !== ARMIES.length) {
    throw new Error(`Invalid turn order: ${order.join(", ")}`);
  }
  for (const army of ARMIES) {
    if (!order.includes(army)) throw new Error(`Turn order is missing ${army}`);
    const controller = config.controllers[army];
    if (controller !== 1 && controller !== 2) throw new Error(`Invalid controller for ${army}: ${String(controller)}`);
  }
}

export function validateBoard(board: BoardState): void {
  // Masks must fit the 64 squares before any bit scan runs on them.
  for (const army of ARMIES) {
    for (const kind of PIECE_KINDS) {
      if (!fitsBoard(board.byArmyKind[army][kind])) {
        throw new Error(`${ARMY_NAME[army]} ${PIECE_NAME[kind]} mask lies outside the board`);
      }
    }
    if (!fitsBoard(board.promotionZones[army])) {
      throw new Error(`${ARMY_NAME[army]} promotion zone lies outside the board`);
    }
  }
  const overlap = findOverlap(board);
  if (overlap !== null) throw new Error(`Overlapping pieces on ${squareName(overlap)}`);
  for (const army of ARMIES) {
    const [first, second] = board.armies[army].thrones;
    if (!isSquare(first) || !isSquare(second)) throw new Error(`Invalid throne squares for ${army}`);
  }
}

export function createGame(board: BoardState, config: GameConfig = DEFAULT_CONFIG): Game {
  validateConfig(config);
  validateBoard(board);
  const state = createGameState();
  syncWithBoard(state, board);
  return { board, config, state };
}

export function createGameFromArray(array: ArraySpec): Game {
  const board = createBoard(
    array.placements,
    perArmy((army) => ({ thrones: array.thrones[army], controller: array.controllers[army], frozen: false })),
    array.promotionZones
  );
  return createGame(board, { armies: ARMIES, turnOrder: array.turnOrder, controllers: array.controllers });
}

export function cloneGame(game: Game): Game {
  return {
    board: cloneBoard(game.board),
    config: game.config,
    state: {
      currentTurnIndex: game.state.currentTurnIndex,
      frozen: { ...game.state.frozen },
      kingSquares: { ...game.state.kingSquares },
      stalemated: { ...game.state.stalemated },
    },
  };
}

export function currentArmy(game: Game): Army {
  const { turnOrder } = game.config;
  const army = turnOrder[game.state.currentTurnIndex % turnOrder.length];
  if (!army) throw new Error("Turn order is empty");
  return army;
}
