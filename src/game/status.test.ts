import { describe, it, expect } from "vitest";
import { armyStatus, describeSquare, statusSummary } from "./status";
import { parseSquare as sq } from "./coords";
import type { Game } from "./state";
import { createGameFromArray } from "./state";
import { captureKing } from "./throne";
import { getArrayById } from "../arrays/arrayRegistry";
import { gameFrom } from "./testGame";

function startGame(): Game {
  return createGameFromArray(getArrayById("tablet_of_fire"));
}

describe("statusSummary", () => {
  it("lists the turn, frozen and stalemated armies", () => {
    expect(statusSummary(startGame())).toBe("Turn: Blue | Frozen: None | Stalemated: None");
  });

  it("names the winning team", () => {
    const game = startGame();
    captureKing(game, "red");
    captureKing(game, "yellow");
    expect(statusSummary(game)).toBe("Turn: Blue | Frozen: Red, Yellow | Stalemated: None | Winner: Air team");
  });
});

describe("armyStatus", () => {
  it("reports frozen, stalemated, in check and active armies", () => {
    const game = gameFrom({ blue: { K: ["e1"] }, red: { R: ["e8"] }, black: { K: ["a5"] } });
    expect(armyStatus(game, "blue")).toBe("In Check");
    expect(armyStatus(game, "black")).toBe("Active");
    game.state.stalemated.black = true;
    expect(armyStatus(game, "black")).toBe("Stalemated");
    game.state.frozen.black = true;
    expect(armyStatus(game, "black")).toBe("Frozen");
  });
});

describe("describeSquare", () => {
  it("describes empty squares", () => {
    expect(describeSquare(startGame(), sq("e4"))).toBe("e4: empty");
  });

  it("lists legal moves with captures", () => {
    const game = gameFrom({ blue: { K: ["a1"], P: ["e2"] }, red: { N: ["d3"] } });
    expect(describeSquare(game, sq("e2"))).toBe(
      "e2: Blue Pawn (Active)\nMoves: d3 (captures Red Knight), e3"
    );
  });

  it("says when a piece has nowhere to go", () => {
    expect(describeSquare(startGame(), sq("e1"))).toBe("e1: Blue King (Active)\nMoves: none");
  });
});
