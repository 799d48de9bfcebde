import { describe, it, expect } from "vitest";
import { computeLegalMoves, generateLegalMoves, mustMoveKing, simulateMove } from "./legalMoves";
import { isKingInCheck, isSquareAttackedByTeam } from "./attacks";
import { pieceAt } from "./board";
import { parseSquare as sq, squareName } from "./coords";
import type { Move } from "./moveTypes";
import { gameFrom } from "./testGame";

const label = (m: Move): string => `${m.piece}${squareName(m.from)}-${squareName(m.to)}`;

describe("check detection", () => {
  it("sees rook and pawn attacks from the opposing team", () => {
    expect(isKingInCheck(gameFrom({ blue: { K: ["e1"] }, red: { R: ["e8"] } }), "blue")).toBe(true);
    expect(isKingInCheck(gameFrom({ blue: { K: ["e1"] }, red: { P: ["d2"] } }), "blue")).toBe(true);
    expect(isKingInCheck(gameFrom({ blue: { K: ["e1"] }, red: { P: ["e2"] } }), "blue")).toBe(false);
  });

  it("ignores allied pieces", () => {
    const game = gameFrom({ blue: { K: ["e1"] }, black: { R: ["e8"] } });
    expect(isKingInCheck(game, "blue")).toBe(false);
  });

  it("frozen armies attack nothing", () => {
    const game = gameFrom({ blue: { K: ["e1"] }, red: { R: ["e8"] } });
    game.state.frozen.red = true;
    expect(isKingInCheck(game, "blue")).toBe(false);
    expect(isSquareAttackedByTeam(game, sq("e4"), "earth")).toBe(false);
  });

  it("a captured king is never in check", () => {
    const game = gameFrom({ red: { R: ["e8"] } });
    expect(isKingInCheck(game, "blue")).toBe(false);
  });
});

describe("generateLegalMoves", () => {
  it("keeps a pinned rook on the pin line", () => {
    const game = gameFrom({ blue: { K: ["e1"], R: ["e2"] }, red: { R: ["e8"] } });
    const rookMoves = generateLegalMoves(game, "blue").filter((m) => m.piece === "R");
    expect(rookMoves.map((m) => squareName(m.to))).toEqual(["e3", "e4", "e5", "e6", "e7", "e8"]);
  });

  it("returns only king moves when the king is in check and can step away", () => {
    const game = gameFrom({ blue: { K: ["e1"], R: ["a2"] }, red: { R: ["e8"] } });
    expect(generateLegalMoves(game, "blue").map(label)).toEqual(["Ke1-d1", "Ke1-f1", "Ke1-d2", "Ke1-f2"]);
    expect(mustMoveKing(game, "blue")).toBe(true);
  });

  it("allows blocking when the king has nowhere to go", () => {
    const game = gameFrom({ blue: { K: ["a1"], N: ["b1"], P: ["b2"], R: ["h3"] }, red: { R: ["a8"] } });
    expect(generateLegalMoves(game, "blue").map(label)).toEqual(["Nb1-a3", "Rh3-a3"]);
    expect(mustMoveKing(game, "blue")).toBe(false);
  });

  it("is empty for frozen and stalemated armies", () => {
    const game = gameFrom({ blue: { K: ["e1"] } });
    game.state.stalemated.blue = true;
    expect(generateLegalMoves(game, "blue")).toEqual([]);
    expect(computeLegalMoves(game, "blue")).toHaveLength(5);

    game.state.frozen.blue = true;
    expect(computeLegalMoves(game, "blue")).toEqual([]);
  });
});

describe("simulateMove", () => {
  it("never touches the original game", () => {
    const game = gameFrom({ blue: { R: ["e2"] }, red: { K: ["e8"] } });
    const capture: Move = {
      kind: "capture",
      army: "blue",
      piece: "R",
      from: sq("e2"),
      to: sq("e8"),
      captured: { army: "red", piece: "K" },
    };
    const next = simulateMove(game, capture);

    expect(pieceAt(next.board, sq("e8"))).toEqual({ army: "blue", piece: "R" });
    expect(next.state.frozen.red).toBe(true);
    expect(next.state.kingSquares.red).toBeNull();

    expect(pieceAt(game.board, sq("e8"))).toEqual({ army: "red", piece: "K" });
    expect(game.state.frozen.red).toBe(false);
    expect(game.state.kingSquares.red).toBe(sq("e8"));
  });
});
