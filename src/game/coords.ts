import type { Bitboard, Square } from "../types.ts";
import { hasBit } from "./bitboard.ts";

export function makeSquare(file: number, rank: number): Square {
  return rank * 8 + file;
}

export function fileOf(square: Square): number {
  return square % 8;
}

export function rankOf(square: Square): number {
  return Math.floor(square / 8);
}

export function inBounds(file: number, rank: number): boolean {
  return file >= 0 && file < 8 && rank >= 0 && rank < 8;
}

export function isSquare(raw: unknown): raw is Square {
  return typeof raw === "number" && Number.isInteger(raw) && raw >= 0 && raw < 64;
}

const SQUARE_NAME_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

/** `"e4"` -> 28. Case-insensitive; throws on anything else. */
export function parseSquare(name: string): Square {
  const match = SQUARE_NAME_RE.exec(name.trim().toLowerCase());
  if (!match || !match.groups) throw new Error(`Invalid square: ${name}`);
  const file = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const rank = Number(match.groups.rank) - 1;
  return makeSquare(file, rank);
}

export function squareName(square: Square): string {
  const file = String.fromCharCode("a".charCodeAt(0) + fileOf(square));
  return `${file}${rankOf(square) + 1}`;
}

export const RANK_1: Bitboard = 0xffn;
export const RANK_8: Bitboard = RANK_1 << 56n;
export const FILE_A: Bitboard = 0x0101_0101_0101_0101n;
export const FILE_H: Bitboard = FILE_A << 7n;

export type Edge = "rank1" | "rank8" | "fileA" | "fileH";

export const EDGE_MASK: Record<Edge, Bitboard> = {
  rank1: RANK_1,
  rank8: RANK_8,
  fileA: FILE_A,
  fileH: FILE_H,
};

export function isEdge(raw: unknown): raw is Edge {
  return raw === "rank1" || raw === "rank8" || raw === "fileA" || raw === "fileH";
}

// The two diagonal systems partition the board the way light and dark
// squares do: a bishop never leaves its system, nor does a leaping queen.
export type DiagonalSystem = "aries" | "cancer";

export const ARIES_DIAGONALS: Bitboard = 0x55aa_55aa_55aa_55aan;

export function diagonalSystem(square: Square): DiagonalSystem {
  return hasBit(ARIES_DIAGONALS, square) ? "aries" : "cancer";
}

export function sameDiagonalSystem(a: Square, b: Square): boolean {
  return diagonalSystem(a) === diagonalSystem(b);
}
