import type { Army, Bitboard, PieceKind, PlayerId } from "../types.ts";
import { ARMIES, isArmy, perArmy, perKind } from "../types.ts";
import type { BoardState } from "./board.ts";
import { parseSquare, squareName } from "./coords.ts";
import type { Game } from "./state.ts";
import { createGameState, refreshDerivedState, validateBoard, validateConfig } from "./state.ts";

/*
 * Snapshots hold only authoritative fields. Occupancy masks, frozen mirrors
 * and king squares are rebuilt by refreshDerivedState() on load.
 */

export interface SerializedArmy {
  thrones: [string, string];
  controller: PlayerId;
  frozen: boolean;
}

export interface GameSnapshot {
  saveVersion: 1;
  board: {
    /** Per army, per kind: `0x` followed by 16 hex digits. */
    byArmyKind: Record<Army, Record<PieceKind, string>>;
    armies: Record<Army, SerializedArmy>;
    promotionZones: Record<Army, string>;
  };
  config: {
    turnOrder: Army[];
    controllers: Record<Army, PlayerId>;
  };
  state: {
    currentTurnIndex: number;
    stalemated: Record<Army, boolean>;
  };
}

export function bitboardToHex(bb: Bitboard): string {
  return `0x${bb.toString(16).padStart(16, "0")}`;
}

const HEX_RE = /^0x[0-9a-f]{1,16}$/i;

export function hexToBitboard(raw: unknown): Bitboard {
  if (typeof raw !== "string" || !HEX_RE.test(raw)) {
    throw new Error(`Invalid save file: bad bitboard ${String(raw)}`);
  }
  return BigInt(raw);
}

export function serializeGame(game: Game): GameSnapshot {
  const { board, config, state } = game;
  return {
    saveVersion: 1,
    board: {
      byArmyKind: perArmy((a) => perKind((k) => bitboardToHex(board.byArmyKind[a][k]))),
      armies: perArmy((a) => {
        const meta = board.armies[a];
        return {
          thrones: [squareName(meta.thrones[0]), squareName(meta.thrones[1])],
          controller: meta.controller,
          frozen: meta.frozen,
        };
      }),
      promotionZones: perArmy((a) => bitboardToHex(board.promotionZones[a])),
    },
    config: {
      turnOrder: [...config.turnOrder],
      controllers: { ...config.controllers },
    },
    state: {
      currentTurnIndex: state.currentTurnIndex,
      stalemated: { ...state.stalemated },
    },
  };
}

/**
 * Rebuild a game from a snapshot. Derived caches come back blank: call
 * refreshDerivedState() before using the result, or use loadGame().
 */
export function deserializeGame(snapshot: GameSnapshot): Game {
  const board: BoardState = {
    byArmyKind: perArmy((a) => perKind((k) => hexToBitboard(snapshot.board.byArmyKind[a][k]))),
    occupancyByArmy: perArmy(() => 0n),
    occupancyByTeam: { air: 0n, earth: 0n },
    allOccupancy: 0n,
    free: 0n,
    armies: perArmy((a) => {
      const meta = snapshot.board.armies[a];
      return {
        thrones: [parseSquare(meta.thrones[0]), parseSquare(meta.thrones[1])],
        controller: meta.controller,
        frozen: meta.frozen,
      };
    }),
    promotionZones: perArmy((a) => hexToBitboard(snapshot.board.promotionZones[a])),
  };

  const state = createGameState();
  state.currentTurnIndex = snapshot.state.currentTurnIndex;
  state.stalemated = { ...snapshot.state.stalemated };

  return {
    board,
    config: {
      armies: ARMIES,
      turnOrder: [...snapshot.config.turnOrder],
      controllers: { ...snapshot.config.controllers },
    },
    state,
  };
}

/** Deserialize, refresh derived state and validate. */
export function loadGame(snapshot: GameSnapshot): Game {
  const game = deserializeGame(snapshot);
  refreshDerivedState(game);
  validateConfig(game.config);
  validateBoard(game.board);
  const idx = game.state.currentTurnIndex;
  if (!Number.isInteger(idx) || idx < 0 || idx >= game.config.turnOrder.length) {
    throw new Error(`Invalid save file: turn index ${idx} out of range`);
  }
  return game;
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function record(raw: unknown, what: string): Record<string, unknown> {
  if (!isRecord(raw)) throw new Error(`Invalid save file: missing ${what}`);
  return raw;
}

function perArmyRecord(raw: unknown, what: string): Record<Army, unknown> {
  const r = record(raw, what);
  return perArmy((a) => {
    if (!(a in r)) throw new Error(`Invalid save file: ${what} has no entry for ${a}`);
    return r[a];
  });
}

function asController(raw: unknown, what: string): PlayerId {
  if (raw === 1 || raw === 2) return raw;
  throw new Error(`Invalid save file: ${what} must be 1 or 2`);
}

function asBoolean(raw: unknown, what: string): boolean {
  if (typeof raw !== "boolean") throw new Error(`Invalid save file: ${what} must be a boolean`);
  return raw;
}

function asString(raw: unknown, what: string): string {
  if (typeof raw !== "string") throw new Error(`Invalid save file: ${what} must be a string`);
  return raw;
}

/** Check the shape of parsed JSON and return it as a snapshot. */
export function parseSnapshot(raw: unknown): GameSnapshot {
  const root = record(raw, "snapshot");
  if (root.saveVersion !== 1) throw new Error(`Invalid save file: unsupported saveVersion ${String(root.saveVersion)}`);

  const board = record(root.board, "board");
  const kinds = perArmyRecord(board.byArmyKind, "board.byArmyKind");
  const byArmyKind = perArmy((a) => {
    const r = record(kinds[a], `board.byArmyKind.${a}`);
    return perKind((k) => {
      const hex = asString(r[k], `board.byArmyKind.${a}.${k}`);
      hexToBitboard(hex);
      return hex;
    });
  });

  const metas = perArmyRecord(board.armies, "board.armies");
  const armies = perArmy((a): SerializedArmy => {
    const m = record(metas[a], `board.armies.${a}`);
    const thrones = m.thrones;
    if (!Array.isArray(thrones) || thrones.length !== 2) {
      throw new Error(`Invalid save file: board.armies.${a}.thrones must hold two squares`);
    }
    return {
      thrones: [asString(thrones[0], `${a} throne`), asString(thrones[1], `${a} throne`)],
      controller: asController(m.controller, `board.armies.${a}.controller`),
      frozen: asBoolean(m.frozen, `board.armies.${a}.frozen`),
    };
  });

  const zones = perArmyRecord(board.promotionZones, "board.promotionZones");
  const promotionZones = perArmy((a) => {
    const hex = asString(zones[a], `board.promotionZones.${a}`);
    hexToBitboard(hex);
    return hex;
  });

  const config = record(root.config, "config");
  if (!Array.isArray(config.turnOrder)) throw new Error("Invalid save file: config.turnOrder must be a list");
  const turnOrder = config.turnOrder.map((a: unknown) => {
    if (!isArmy(a)) throw new Error(`Invalid save file: unknown army ${String(a)}`);
    return a;
  });
  const controllersRaw = perArmyRecord(config.controllers, "config.controllers");
  const controllers = perArmy((a) => asController(controllersRaw[a], `config.controllers.${a}`));

  const state = record(root.state, "state");
  const currentTurnIndex = state.currentTurnIndex;
  if (typeof currentTurnIndex !== "number") throw new Error("Invalid save file: state.currentTurnIndex must be a number");
  const stalematedRaw = perArmyRecord(state.stalemated, "state.stalemated");
  const stalemated = perArmy((a) => asBoolean(stalematedRaw[a], `state.stalemated.${a}`));

  return {
    saveVersion: 1,
    board: { byArmyKind, armies, promotionZones },
    config: { turnOrder, controllers },
    state: { currentTurnIndex, stalemated },
  };
}

export function gameToJson(game: Game): string {
  return JSON.stringify(serializeGame(game), null, 2);
}

export function gameFromJson(text: string): Game {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid save file: ${err instanceof Error ? err.message : String(err)}`);
  }
  return loadGame(parseSnapshot(raw));
}
