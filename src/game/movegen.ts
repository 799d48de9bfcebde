import type { Army, Bitboard, Piece, PieceKind, Square } from "../types.ts";
import { PIECE_KINDS } from "../types.ts";
import type { BoardState } from "./board.ts";
import { pieceAt } from "./board.ts";
import { bit, complement, lsb, msb, squaresOf } from "./bitboard.ts";
import { sameDiagonalSystem } from "./coords.ts";
import type { Direction } from "./geometry.ts";
import {
  BISHOP_DIRECTIONS,
  KING_STEPS,
  KNIGHT_STEPS,
  PAWN_ATTACKS,
  PAWN_PUSHES,
  QUEEN_LEAPS,
  RAYS,
  ROOK_DIRECTIONS,
  isIncreasing,
} from "./geometry.ts";
import type { Move } from "./moveTypes.ts";

/*
 * Pseudo-legal move generation: own pieces block, foreign pieces may be
 * captured subject to the queen/bishop restrictions. Self-check is not
 * considered here (see legalMoves.ts).
 */

type CaptureRule = (from: Square, target: Piece, at: Square) => boolean;

const captureAnything: CaptureRule = () => true;

// Bishops never take bishops, and take queens only on their own diagonal system.
const bishopCaptures: CaptureRule = (from, target, at) => {
  if (target.piece === "B") return false;
  if (target.piece === "Q") return sameDiagonalSystem(from, at);
  return true;
};

// Queens never take queens, and take bishops only on their own diagonal system.
const queenCaptures: CaptureRule = (from, target, at) => {
  if (target.piece === "Q") return false;
  if (target.piece === "B") return sameDiagonalSystem(from, at);
  return true;
};

function ownMask(board: BoardState, army: Army): Bitboard {
  return board.occupancyByArmy[army];
}

function foreignMask(board: BoardState, army: Army): Bitboard {
  return board.allOccupancy & complement(board.occupancyByArmy[army]);
}

/**
 * Squares reachable along one ray: everything before the nearest blocker,
 * plus the blocker itself when it is a foreign piece `canCapture` accepts.
 */
function slideRay(board: BoardState, army: Army, from: Square, dir: Direction, canCapture: CaptureRule): Bitboard {
  const ray = RAYS[from][dir];
  const blockers = ray & board.allOccupancy;
  if (blockers === 0n) return ray;

  const blocker = isIncreasing(dir) ? lsb(blockers) : msb(blockers);
  const open = ray & complement(RAYS[blocker][dir] | bit(blocker));

  const target = pieceAt(board, blocker);
  if (target && target.army !== army && canCapture(from, target, blocker)) return open | bit(blocker);
  return open;
}

export function kingDestinations(board: BoardState, army: Army, from: Square): Bitboard {
  return KING_STEPS[from] & complement(ownMask(board, army));
}

export function knightDestinations(board: BoardState, army: Army, from: Square): Bitboard {
  return KNIGHT_STEPS[from] & complement(ownMask(board, army));
}

export function rookDestinations(board: BoardState, army: Army, from: Square): Bitboard {
  let moves = 0n;
  for (const dir of ROOK_DIRECTIONS) moves |= slideRay(board, army, from, dir, captureAnything);
  return moves;
}

export function bishopDestinations(board: BoardState, army: Army, from: Square): Bitboard {
  let moves = 0n;
  for (const dir of BISHOP_DIRECTIONS) moves |= slideRay(board, army, from, dir, bishopCaptures);
  return moves;
}

/** Two-square leaps; intervening pieces do not block. */
export function queenDestinations(board: BoardState, army: Army, from: Square): Bitboard {
  let moves = 0n;
  for (const to of squaresOf(QUEEN_LEAPS[from] & complement(ownMask(board, army)))) {
    const target = pieceAt(board, to);
    if (!target || queenCaptures(from, target, to)) moves |= bit(to);
  }
  return moves;
}

/** Pawns move and capture on different squares, so both sets are returned. */
export function pawnDestinations(board: BoardState, army: Army, from: Square): { quiet: Bitboard; attacks: Bitboard } {
  return {
    quiet: PAWN_PUSHES[army][from] & board.free,
    attacks: PAWN_ATTACKS[army][from] & foreignMask(board, army),
  };
}

export function pseudoDestinations(board: BoardState, army: Army, kind: PieceKind, from: Square): Bitboard {
  switch (kind) {
    case "K":
      return kingDestinations(board, army, from);
    case "Q":
      return queenDestinations(board, army, from);
    case "B":
      return bishopDestinations(board, army, from);
    case "N":
      return knightDestinations(board, army, from);
    case "R":
      return rookDestinations(board, army, from);
    case "P": {
      const { quiet, attacks } = pawnDestinations(board, army, from);
      return quiet | attacks;
    }
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown piece kind: ${String(unknown)}`);
    }
  }
}

/** Union of the destinations of every `kind` piece of `army`. */
export function kindDestinations(board: BoardState, army: Army, kind: PieceKind): Bitboard {
  let moves = 0n;
  for (const from of squaresOf(board.byArmyKind[army][kind])) moves |= pseudoDestinations(board, army, kind, from);
  return moves;
}

export function pawnMoves(board: BoardState, army: Army): { quiet: Bitboard; attacks: Bitboard } {
  let quiet = 0n;
  let attacks = 0n;
  for (const from of squaresOf(board.byArmyKind[army].P)) {
    const d = pawnDestinations(board, army, from);
    quiet |= d.quiet;
    attacks |= d.attacks;
  }
  return { quiet, attacks };
}

export function generatePseudoMoves(board: BoardState, army: Army): Move[] {
  const out: Move[] = [];
  for (const kind of PIECE_KINDS) {
    for (const from of squaresOf(board.byArmyKind[army][kind])) {
      for (const to of squaresOf(pseudoDestinations(board, army, kind, from))) {
        const target = pieceAt(board, to);
        if (target) {
          out.push({ kind: "capture", army, piece: kind, from, to, captured: target });
        } else {
          out.push({ kind: "move", army, piece: kind, from, to });
        }
      }
    }
  }
  return out;
}
