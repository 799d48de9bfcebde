export type Army = "blue" | "black" | "red" | "yellow";
export type Team = "air" | "earth";
export type PieceKind = "K" | "Q" | "B" | "N" | "R" | "P";

/** 0..63, a1 = 0, h1 = 7, a8 = 56. */
export type Square = number;
/** 64-bit square set, bit n = square n. */
export type Bitboard = bigint;
/** Controlling side an army answers to. */
export type PlayerId = 1 | 2;

export interface Piece { army: Army; piece: PieceKind; }

export const ARMIES: readonly Army[] = ["blue", "black", "red", "yellow"];
export const TEAMS: readonly Team[] = ["air", "earth"];
export const PIECE_KINDS: readonly PieceKind[] = ["K", "Q", "B", "N", "R", "P"];

const TEAM_OF: Record<Army, Team> = {
  blue: "air",
  black: "air",
  red: "earth",
  yellow: "earth",
};

export function teamOf(army: Army): Team {
  return TEAM_OF[army];
}

export function teamArmies(team: Team): [Army, Army] {
  return team === "air" ? ["blue", "black"] : ["red", "yellow"];
}

export function opponentTeam(team: Team): Team {
  return team === "air" ? "earth" : "air";
}

export function allyOf(army: Army): Army {
  const [a, b] = teamArmies(teamOf(army));
  return a === army ? b : a;
}

export function isArmy(raw: unknown): raw is Army {
  return raw === "blue" || raw === "black" || raw === "red" || raw === "yellow";
}

export function isPieceKind(raw: unknown): raw is PieceKind {
  return raw === "K" || raw === "Q" || raw === "B" || raw === "N" || raw === "R" || raw === "P";
}

export const ARMY_NAME: Record<Army, string> = {
  blue: "Blue",
  black: "Black",
  red: "Red",
  yellow: "Yellow",
};

export const TEAM_NAME: Record<Team, string> = {
  air: "Air",
  earth: "Earth",
};

export const PIECE_NAME: Record<PieceKind, string> = {
  K: "King",
  Q: "Queen",
  B: "Bishop",
  N: "Knight",
  R: "Rook",
  P: "Pawn",
};

/** Builds a record with one entry per army. */
export function perArmy<T>(init: (army: Army) => T): Record<Army, T> {
  return {
    blue: init("blue"),
    black: init("black"),
    red: init("red"),
    yellow: init("yellow"),
  };
}

export function perKind<T>(init: (kind: PieceKind) => T): Record<PieceKind, T> {
  return {
    K: init("K"),
    Q: init("Q"),
    B: init("B"),
    N: init("N"),
    R: init("R"),
    P: init("P"),
  };
}
