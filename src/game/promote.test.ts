import { describe, it, expect } from "vitest";
import { canPromoteAt, isPrivilegedPawn, promotePawn, promotionTargets } from "./promote";
import { pieceAt, pieceCounts } from "./board";
import { parseSquare as sq } from "./coords";
import { boardFrom } from "./testGame";

describe("privileged pawns", () => {
  it("needs a king, a pawn and at most one other piece", () => {
    expect(isPrivilegedPawn(boardFrom({ blue: { K: ["a1"], P: ["e2"] } }), "blue")).toBe(true);
    expect(isPrivilegedPawn(boardFrom({ blue: { K: ["a1"], Q: ["d4"], P: ["e2"] } }), "blue")).toBe(true);
    expect(isPrivilegedPawn(boardFrom({ blue: { K: ["a1"], Q: ["d4"], R: ["h1"], P: ["e2"] } }), "blue")).toBe(false);
    expect(isPrivilegedPawn(boardFrom({ blue: { P: ["e2"] } }), "blue")).toBe(false);
  });

  it("offers every target only when privileged", () => {
    expect(promotionTargets(boardFrom({ blue: { K: ["a1"], P: ["e2"] } }), "blue")).toEqual(["Q", "R", "B", "N"]);
    expect(promotionTargets(boardFrom({ blue: { K: ["a1"], N: ["b1"], B: ["c1"], P: ["e2"] } }), "blue")).toEqual([
      "Q",
    ]);
  });
});

describe("promotePawn", () => {
  it("gives a privileged pawn the requested piece", () => {
    const board = boardFrom({ blue: { K: ["a1"], P: ["e8"] } });
    expect(promotePawn(board, "blue", sq("e8"), "N")).toEqual({ promotedTo: "N", demoted: null });
    expect(pieceAt(board, sq("e8"))).toEqual({ army: "blue", piece: "N" });
  });

  it("makes an ordinary pawn a queen whatever was asked", () => {
    const board = boardFrom({ blue: { K: ["a1"], Q: ["d4"], R: ["h1"], P: ["e8"] } });
    expect(promotePawn(board, "blue", sq("e8"), "N")).toEqual({ promotedTo: "Q", demoted: null });
    expect(pieceAt(board, sq("e8"))).toEqual({ army: "blue", piece: "Q" });
    expect(pieceCounts(board, "blue").Q).toBe(2);
  });

  it("demotes the existing piece of the requested kind", () => {
    const board = boardFrom({ blue: { K: ["a1"], Q: ["d4"], P: ["e8"] } });
    expect(promotePawn(board, "blue", sq("e8"), "Q")).toEqual({ promotedTo: "Q", demoted: sq("d4") });
    expect(pieceAt(board, sq("d4"))).toEqual({ army: "blue", piece: "P" });
    expect(pieceAt(board, sq("e8"))).toEqual({ army: "blue", piece: "Q" });
    expect(pieceCounts(board, "blue")).toEqual({ K: 1, Q: 1, B: 0, N: 0, R: 0, P: 1 });
  });

  it("defaults to a queen", () => {
    const board = boardFrom({ red: { K: ["e8"], P: ["a1"] } });
    expect(promotePawn(board, "red", sq("a1"))).toEqual({ promotedTo: "Q", demoted: null });
  });

  it("refuses pawn and king targets and missing pawns", () => {
    const board = boardFrom({ blue: { K: ["a1"], P: ["e8"] } });
    expect(() => promotePawn(board, "blue", sq("e8"), "K")).toThrow("Cannot promote to K");
    expect(promotePawn(board, "blue", sq("d8"), "Q")).toBeNull();
    expect(pieceAt(board, sq("e8"))).toEqual({ army: "blue", piece: "P" });
  });
});

describe("promotion zones", () => {
  it("sits on the far edge of each army", () => {
    const board = boardFrom({});
    expect(canPromoteAt(board, "blue", sq("c8"))).toBe(true);
    expect(canPromoteAt(board, "black", sq("h4"))).toBe(true);
    expect(canPromoteAt(board, "black", sq("a4"))).toBe(false);
    expect(canPromoteAt(board, "red", sq("c1"))).toBe(true);
    expect(canPromoteAt(board, "yellow", sq("a7"))).toBe(true);
  });
});
