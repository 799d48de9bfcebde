import { describe, it, expect } from "vitest";
import { DEFAULT_ARMY_META, DEFAULT_PROMOTION_ZONES, createBoard } from "./board";
import { DEFAULT_CONFIG, createGame } from "./state";
import { boardFrom } from "./testGame";

describe("createGame", () => {
  it("accepts a legal board and mirrors its kings", () => {
    const game = createGame(boardFrom({ blue: { K: ["e1"] }, red: { K: ["e8"] } }));
    expect(game.state.kingSquares).toEqual({ blue: 4, black: null, red: 60, yellow: null });
    expect(game.state.currentTurnIndex).toBe(0);
  });

  it("rejects piece masks with bits past square 63", () => {
    const board = createBoard([
      { army: "blue", piece: "K", squares: 1n << 4n },
      { army: "blue", piece: "N", squares: 1n << 70n },
    ]);
    expect(() => createGame(board)).toThrow("Blue Knight mask lies outside the board");
  });

  it("rejects negative piece masks", () => {
    const board = createBoard([{ army: "red", piece: "R", squares: -16n }]);
    expect(() => createGame(board)).toThrow("Red Rook mask lies outside the board");
  });

  it("rejects promotion zones off the board", () => {
    const board = createBoard([], DEFAULT_ARMY_META, { ...DEFAULT_PROMOTION_ZONES, yellow: 1n << 64n });
    expect(() => createGame(board)).toThrow("Yellow promotion zone lies outside the board");
  });

  it("rejects overlapping pieces", () => {
    const board = createBoard([
      { army: "blue", piece: "N", squares: 1n << 28n },
      { army: "red", piece: "B", squares: 1n << 28n },
    ]);
    expect(() => createGame(board)).toThrow("Overlapping pieces on e4");
  });

  it("needs all four armies in the config", () => {
    const board = boardFrom({});
    expect(() => createGame(board, { ...DEFAULT_CONFIG, armies: ["blue", "red", "black"] })).toThrow(
      "Invalid army list: blue, red, black"
    );
  });
});
