import { describe, it, expect } from "vitest";
import { asciiBoard, asciiRows, pieceChar } from "./asciiBoard";
import { createGameFromArray } from "../game/state";
import { getArrayById } from "../arrays/arrayRegistry";
import { boardFrom } from "../game/testGame";

describe("asciiRows", () => {
  it("draws the starting array rank 8 first", () => {
    const game = createGameFromArray(getArrayById("tablet_of_fire"));
    expect(asciiRows(game.board)).toEqual([
      "8 . . Q B K N R .",
      "7 . . P P P P . r",
      "6 q p . . . . p n",
      "5 k p . . . . p k",
      "4 b p . . . . p b",
      "3 n p . . . . p q",
      "2 r . P P P P . .",
      "1 . R N B K Q . .",
    ]);
  });

  it("adds a file legend below the board", () => {
    const text = asciiBoard(boardFrom({ yellow: { K: ["h1"] } }));
    const lines = text.split("\n");
    expect(lines).toHaveLength(9);
    expect(lines[7]).toBe("1 . . . . . . . k");
    expect(lines[8]).toBe("  a b c d e f g h");
  });

  it("cases pieces by army", () => {
    expect(pieceChar({ army: "blue", piece: "N" })).toBe("N");
    expect(pieceChar({ army: "red", piece: "N" })).toBe("N");
    expect(pieceChar({ army: "black", piece: "N" })).toBe("n");
    expect(pieceChar({ army: "yellow", piece: "N" })).toBe("n");
    expect(pieceChar(null)).toBe(".");
  });
});
