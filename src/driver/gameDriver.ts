import type { ApplyMoveResult, Army, ArrayId, ExchangeResult, Game, GameSnapshot, Move, PieceKind, Square } from "../core/index.ts";

export type DriverMode = "local";

export interface HistoryEntry {
  index: number;
  toMove: Army;
  isCurrent: boolean;
  notation: string;
}

export interface GameDriver {
  readonly mode: DriverMode;

  getGame(): Game;
  currentArmy(): Army;
  legalMoves(army?: Army): Move[];

  submitMove(army: Army, from: Square, to: Square, promotion?: PieceKind): ApplyMoveResult;
  /** Accepts `"blue: e2-e3"`; without an army the move is played for the army to move. */
  submitMoveText(text: string): ApplyMoveResult;
  exchangePrisoners(a: Army, b: Army): ExchangeResult;

  canUndo(): boolean;
  canRedo(): boolean;
  undo(): Game | null;
  redo(): Game | null;
  jumpToHistory(index: number): Game | null;
  getHistory(): HistoryEntry[];

  getArrayId(): ArrayId | null;
  loadArray(id: ArrayId): Game;
  cycleArray(direction: 1 | -1): ArrayId;

  toSnapshot(): GameSnapshot;
  restoreSnapshot(snapshot: GameSnapshot): Game;

  statusSummary(): string;
  boardRows(): string[];
}
