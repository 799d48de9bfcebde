import { describe, it, expect } from "vitest";
import { formatMove, parseMoveText } from "./coordFormat";
import { parseSquare as sq } from "./coords";

describe("parseMoveText", () => {
  it("reads army, squares and promotion", () => {
    expect(parseMoveText("blue: e2-e3")).toEqual({ army: "blue", from: sq("e2"), to: sq("e3") });
    expect(parseMoveText("Red: E7xE6")).toEqual({ army: "red", from: sq("e7"), to: sq("e6") });
    expect(parseMoveText(" blue: e2 - e3 ")).toEqual({ army: "blue", from: sq("e2"), to: sq("e3") });
    expect(parseMoveText("e7-e8=n")).toEqual({ from: sq("e7"), to: sq("e8"), promotion: "N" });
  });

  it("throws on malformed text", () => {
    expect(() => parseMoveText("e2e3")).toThrow("Invalid move text: e2e3");
    expect(() => parseMoveText("purple: e2-e3")).toThrow("Unknown army: purple");
    expect(() => parseMoveText("e7-e8=z")).toThrow("Unknown piece: z");
  });
});

describe("formatMove", () => {
  it("uses a dash for moves and an x for captures", () => {
    expect(formatMove({ kind: "move", army: "blue", piece: "P", from: sq("e2"), to: sq("e3") })).toBe("e2-e3");
    expect(
      formatMove({
        kind: "capture",
        army: "blue",
        piece: "B",
        from: sq("e5"),
        to: sq("f6"),
        captured: { army: "red", piece: "N" },
      })
    ).toBe("e5xf6");
    expect(formatMove({ kind: "move", army: "blue", piece: "P", from: sq("e7"), to: sq("e8") }, "Q")).toBe(
      "e7-e8=Q"
    );
  });
});
