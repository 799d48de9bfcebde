import type { GameDriver, HistoryEntry } from "./gameDriver.ts";
import type {
  ApplyMoveResult,
  Army,
  ArrayId,
  ExchangeResult,
  Game,
  GameSnapshot,
  Move,
  PieceKind,
  Square,
} from "../core/index.ts";
import {
  DEFAULT_ARRAY_ID,
  applyMove,
  asciiRows,
  createGameFromArray,
  currentArmy,
  exchangePrisoners,
  formatMove,
  generateLegalMoves,
  getArrayById,
  loadGame,
  nextArrayId,
  parseMoveText,
  serializeGame,
  statusSummary,
} from "../core/index.ts";
import { HistoryManager } from "../game/historyManager.ts";

export class LocalDriver implements GameDriver {
  readonly mode = "local" as const;

  private game: Game;
  private history: HistoryManager;
  private arrayId: ArrayId | null;

  constructor(game: Game, history: HistoryManager = new HistoryManager(), arrayId: ArrayId | null = null) {
    this.game = game;
    this.history = history;
    this.arrayId = arrayId;
    if (history.size() === 0) history.push(game, "start");
  }

  static fromArray(id: ArrayId = DEFAULT_ARRAY_ID): LocalDriver {
    return new LocalDriver(createGameFromArray(getArrayById(id)), new HistoryManager(), id);
  }

  getGame(): Game {
    return this.game;
  }

  currentArmy(): Army {
    return currentArmy(this.game);
  }

  legalMoves(army: Army = this.currentArmy()): Move[] {
    return generateLegalMoves(this.game, army);
  }

  submitMove(army: Army, from: Square, to: Square, promotion?: PieceKind): ApplyMoveResult {
    const result = applyMove(this.game, army, from, to, promotion);
    if (result.ok) this.history.push(this.game, `${army}: ${formatMove(result.move, result.promotedTo)}`);
    return result;
  }

  submitMoveText(text: string): ApplyMoveResult {
    const parsed = parseMoveText(text);
    return this.submitMove(parsed.army ?? this.currentArmy(), parsed.from, parsed.to, parsed.promotion);
  }

  exchangePrisoners(a: Army, b: Army): ExchangeResult {
    const result = exchangePrisoners(this.game, a, b);
    if (result.ok) this.history.push(this.game, `exchange ${a}/${b}`);
    return result;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  undo(): Game | null {
    const g = this.history.undo();
    if (g) this.game = g;
    return g;
  }

  redo(): Game | null {
    const g = this.history.redo();
    if (g) this.game = g;
    return g;
  }

  jumpToHistory(index: number): Game | null {
    const g = this.history.jumpTo(index);
    if (g) this.game = g;
    return g;
  }

  getHistory(): HistoryEntry[] {
    return this.history.getHistory();
  }

  getArrayId(): ArrayId | null {
    return this.arrayId;
  }

  /** Start over from a catalog array; history restarts too. */
  loadArray(id: ArrayId): Game {
    this.game = createGameFromArray(getArrayById(id));
    this.arrayId = id;
    this.history.clear();
    this.history.push(this.game, "start");
    return this.game;
  }

  cycleArray(direction: 1 | -1): ArrayId {
    const next = nextArrayId(this.arrayId ?? DEFAULT_ARRAY_ID, direction);
    this.loadArray(next);
    return next;
  }

  toSnapshot(): GameSnapshot {
    return serializeGame(this.game);
  }

  restoreSnapshot(snapshot: GameSnapshot): Game {
    this.game = loadGame(snapshot);
    this.arrayId = null;
    this.history.clear();
    this.history.push(this.game, "restored");
    return this.game;
  }

  statusSummary(): string {
    return statusSummary(this.game);
  }

  boardRows(): string[] {
    return asciiRows(this.game.board);
  }
}
