import type { Army, Bitboard, Piece, PieceKind, PlayerId, Square, Team } from "../types.ts";
import { ARMIES, PIECE_KINDS, perArmy, perKind, teamOf } from "../types.ts";
import { bit, complement, lsb, popCount, squaresOf } from "./bitboard.ts";
import { FILE_A, FILE_H, RANK_1, RANK_8, makeSquare } from "./coords.ts";

export interface ArmyMeta {
  /** Home squares; a returning king is restored onto the first one. */
  thrones: [Square, Square];
  controller: PlayerId;
  frozen: boolean;
}

export interface BoardState {
  byArmyKind: Record<Army, Record<PieceKind, Bitboard>>;
  // Caches below are rebuilt by refreshOccupancy(); never the source of truth.
  occupancyByArmy: Record<Army, Bitboard>;
  occupancyByTeam: Record<Team, Bitboard>;
  allOccupancy: Bitboard;
  free: Bitboard;
  armies: Record<Army, ArmyMeta>;
  promotionZones: Record<Army, Bitboard>;
}

export interface Placement {
  army: Army;
  piece: PieceKind;
  squares: Bitboard;
}

export const DEFAULT_ARMY_META: Readonly<Record<Army, Readonly<ArmyMeta>>> = {
  blue: { thrones: [makeSquare(3, 0), makeSquare(4, 0)], controller: 1, frozen: false },
  black: { thrones: [makeSquare(0, 3), makeSquare(0, 4)], controller: 1, frozen: false },
  red: { thrones: [makeSquare(3, 7), makeSquare(4, 7)], controller: 2, frozen: false },
  yellow: { thrones: [makeSquare(7, 3), makeSquare(7, 4)], controller: 2, frozen: false },
};

// Blue marches north, Black east, Red south, Yellow west.
export const DEFAULT_PROMOTION_ZONES: Readonly<Record<Army, Bitboard>> = {
  blue: RANK_8,
  black: FILE_H,
  red: RANK_1,
  yellow: FILE_A,
};

function cloneArmyMeta(meta: Readonly<ArmyMeta>): ArmyMeta {
  return { thrones: [meta.thrones[0], meta.thrones[1]], controller: meta.controller, frozen: meta.frozen };
}

export function createBoard(
  placements: readonly Placement[],
  armies: Readonly<Record<Army, Readonly<ArmyMeta>>> = DEFAULT_ARMY_META,
  promotionZones: Readonly<Record<Army, Bitboard>> = DEFAULT_PROMOTION_ZONES
): BoardState {
  const byArmyKind = perArmy(() => perKind(() => 0n));
  for (const p of placements) {
    byArmyKind[p.army][p.piece] |= p.squares;
  }

  const board: BoardState = {
    byArmyKind,
    occupancyByArmy: perArmy(() => 0n),
    occupancyByTeam: { air: 0n, earth: 0n },
    allOccupancy: 0n,
    free: 0n,
    armies: perArmy((a) => cloneArmyMeta(armies[a])),
    promotionZones: perArmy((a) => promotionZones[a]),
  };
  refreshOccupancy(board);
  return board;
}

export function createEmptyBoard(): BoardState {
  return createBoard([]);
}

export function cloneBoard(board: BoardState): BoardState {
  return {
    byArmyKind: perArmy((a) => ({ ...board.byArmyKind[a] })),
    occupancyByArmy: { ...board.occupancyByArmy },
    occupancyByTeam: { ...board.occupancyByTeam },
    allOccupancy: board.allOccupancy,
    free: board.free,
    armies: perArmy((a) => cloneArmyMeta(board.armies[a])),
    promotionZones: { ...board.promotionZones },
  };
}

/** Rebuild every derived occupancy mask from `byArmyKind`. */
export function refreshOccupancy(board: BoardState): void {
  const byTeam: Record<Team, Bitboard> = { air: 0n, earth: 0n };
  for (const army of ARMIES) {
    let bits = 0n;
    for (const kind of PIECE_KINDS) bits |= board.byArmyKind[army][kind];
    board.occupancyByArmy[army] = bits;
    byTeam[teamOf(army)] |= bits;
  }
  board.occupancyByTeam = byTeam;
  board.allOccupancy = byTeam.air | byTeam.earth;
  board.free = complement(board.allOccupancy);
}

export function pieceAt(board: BoardState, square: Square): Piece | null {
  const mask = bit(square);
  for (const army of ARMIES) {
    for (const kind of PIECE_KINDS) {
      if ((board.byArmyKind[army][kind] & mask) !== 0n) return { army, piece: kind };
    }
  }
  return null;
}

export function placePiece(board: BoardState, army: Army, kind: PieceKind, square: Square): void {
  board.byArmyKind[army][kind] |= bit(square);
  refreshOccupancy(board);
}

export function removePiece(board: BoardState, army: Army, kind: PieceKind, square: Square): void {
  board.byArmyKind[army][kind] &= complement(bit(square));
  refreshOccupancy(board);
}

export function movePiece(board: BoardState, army: Army, kind: PieceKind, from: Square, to: Square): void {
  const masks = board.byArmyKind[army];
  masks[kind] = (masks[kind] & complement(bit(from))) | bit(to);
  refreshOccupancy(board);
}

export function clearSquare(board: BoardState, square: Square): void {
  const keep = complement(bit(square));
  for (const army of ARMIES) {
    for (const kind of PIECE_KINDS) board.byArmyKind[army][kind] &= keep;
  }
  refreshOccupancy(board);
}

/**
 * Turn the lowest-indexed `kind` piece of `army` into a pawn where it stands.
 * Returns its square, or null when `kind` is Pawn or the army has none.
 */
export function demotePieceToPawn(board: BoardState, army: Army, kind: PieceKind): Square | null {
  if (kind === "P") return null;
  const masks = board.byArmyKind[army];
  if (masks[kind] === 0n) return null;
  const square = lsb(masks[kind]);
  masks[kind] &= complement(bit(square));
  masks.P |= bit(square);
  refreshOccupancy(board);
  return square;
}

export function kingSquare(board: BoardState, army: Army): Square | null {
  const kings = board.byArmyKind[army].K;
  return kings === 0n ? null : lsb(kings);
}

export function throneOwner(board: BoardState, square: Square): Army | null {
  for (const army of ARMIES) {
    if (board.armies[army].thrones.includes(square)) return army;
  }
  return null;
}

export function pieceCounts(board: BoardState, army: Army): Record<PieceKind, number> {
  return perKind((kind) => popCount(board.byArmyKind[army][kind]));
}

export function piecesOf(board: BoardState, army: Army): Array<{ square: Square; piece: PieceKind }> {
  const out: Array<{ square: Square; piece: PieceKind }> = [];
  for (const kind of PIECE_KINDS) {
    for (const square of squaresOf(board.byArmyKind[army][kind])) out.push({ square, piece: kind });
  }
  return out;
}

export function setFrozen(board: BoardState, army: Army, frozen: boolean): void {
  board.armies[army].frozen = frozen;
}

export function setController(board: BoardState, army: Army, controller: PlayerId): void {
  board.armies[army].controller = controller;
}

/** First overlapping square between two (army, kind) masks, or null when all are disjoint. */
export function findOverlap(board: BoardState): Square | null {
  let seen = 0n;
  for (const army of ARMIES) {
    for (const kind of PIECE_KINDS) {
      const mask = board.byArmyKind[army][kind];
      const clash = seen & mask;
      if (clash !== 0n) return lsb(clash);
      seen |= mask;
    }
  }
  return null;
}

/** Disjoint masks and derived caches that match them. */
export function isBoardConsistent(board: BoardState): boolean {
  if (findOverlap(board) !== null) return false;
  let all = 0n;
  for (const army of ARMIES) {
    let bits = 0n;
    for (const kind of PIECE_KINDS) bits |= board.byArmyKind[army][kind];
    if (board.occupancyByArmy[army] !== bits) return false;
    all |= bits;
  }
  const air = board.occupancyByArmy.blue | board.occupancyByArmy.black;
  const earth = board.occupancyByArmy.red | board.occupancyByArmy.yellow;
  if (board.occupancyByTeam.air !== air || board.occupancyByTeam.earth !== earth) return false;
  return board.allOccupancy === all && board.free === complement(all);
}
