import { describe, it, expect, beforeEach } from "vitest";
import { HistoryManager } from "./historyManager";
import { pieceAt } from "./board";
import { parseSquare as sq } from "./coords";
import type { Game } from "./state";
import { gameFrom } from "./testGame";

describe("HistoryManager", () => {
  let history: HistoryManager;
  let game1: Game;
  let game2: Game;
  let game3: Game;

  beforeEach(() => {
    history = new HistoryManager();
    game1 = gameFrom({ blue: { K: ["e1"] } });
    game2 = gameFrom({ blue: { K: ["e2"] } });
    game2.state.currentTurnIndex = 1;
    game3 = gameFrom({ blue: { K: ["e3"] } });
    game3.state.currentTurnIndex = 2;
  });

  it("should start with no history", () => {
    expect(history.size()).toBe(0);
    expect(history.canUndo()).toBe(false);
    expect(history.canRedo()).toBe(false);
    expect(history.getCurrent()).toBeNull();
  });

  it("should record positions", () => {
    history.push(game1);
    expect(history.size()).toBe(1);
    expect(history.getCurrentIndex()).toBe(0);

    history.push(game2);
    expect(history.size()).toBe(2);
    expect(history.getCurrentIndex()).toBe(1);
  });

  it("should undo and redo", () => {
    history.push(game1);
    history.push(game2);

    const prev = history.undo();
    expect(prev).not.toBeNull();
    expect(pieceAt(prev!.board, sq("e1"))).toEqual({ army: "blue", piece: "K" });
    expect(history.canRedo()).toBe(true);

    const next = history.redo();
    expect(pieceAt(next!.board, sq("e2"))).toEqual({ army: "blue", piece: "K" });
    expect(history.redo()).toBeNull();
  });

  it("should store copies, not the live game", () => {
    history.push(game1);
    game1.board.byArmyKind.blue.K = 0n;
    game1.state.currentTurnIndex = 3;

    const stored = history.getCurrent();
    expect(pieceAt(stored!.board, sq("e1"))).toEqual({ army: "blue", piece: "K" });
    expect(stored!.state.currentTurnIndex).toBe(0);

    stored!.state.frozen.blue = true;
    expect(history.getCurrent()!.state.frozen.blue).toBe(false);
  });

  it("should drop the redo branch when a new position is pushed", () => {
    history.push(game1);
    history.push(game2);
    history.undo();
    history.push(game3, "blue: e1-e3");

    expect(history.size()).toBe(2);
    expect(history.canRedo()).toBe(false);
    expect(history.getHistory()).toEqual([
      { index: 0, toMove: "blue", isCurrent: false, notation: "" },
      { index: 1, toMove: "black", isCurrent: true, notation: "blue: e1-e3" },
    ]);
  });

  it("should jump to any recorded index", () => {
    history.push(game1);
    history.push(game2);
    history.push(game3);

    expect(history.jumpTo(0)).not.toBeNull();
    expect(history.getCurrentIndex()).toBe(0);
    expect(history.jumpTo(5)).toBeNull();
    expect(history.getCurrentIndex()).toBe(0);
  });

  it("should export and replace snapshots", () => {
    history.push(game1, "start");
    history.push(game2, "blue: e1-e2");

    const exported = history.exportSnapshots();
    const other = new HistoryManager();
    other.replaceAll(exported.games, ["start"], 5);

    expect(other.size()).toBe(2);
    expect(other.getCurrentIndex()).toBe(1);
    expect(other.getHistory().map((h) => h.notation)).toEqual(["start", ""]);
  });

  it("should clear", () => {
    history.push(game1);
    history.clear();
    expect(history.size()).toBe(0);
    expect(history.getCurrentIndex()).toBe(-1);
  });
});
