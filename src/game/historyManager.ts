import type { Army } from "../types.ts";
import type { Game } from "./state.ts";
import { cloneGame, currentArmy } from "./state.ts";

export interface HistorySnapshots {
  games: Game[];
  notation: string[];
  currentIndex: number;
}

/**
 * Manages game history for undo/redo functionality.
 * Stores copies of the game at turn boundaries, with the notation of the
 * move that led to each one.
 */
export class HistoryManager {
  private history: Game[] = [];
  private moveNotation: string[] = []; // Parallel array storing move notation
  private currentIndex: number = -1;

  exportSnapshots(): HistorySnapshots {
    return {
      games: this.history.map((g) => cloneGame(g)),
      notation: [...this.moveNotation],
      currentIndex: this.currentIndex,
    };
  }

  replaceAll(games: Game[], notation: string[], currentIndex: number): void {
    const clonedGames = games.map((g) => cloneGame(g));
    const clonedNotation = [...notation];

    // Keep arrays aligned.
    while (clonedNotation.length < clonedGames.length) clonedNotation.push("");
    if (clonedNotation.length > clonedGames.length) clonedNotation.length = clonedGames.length;

    const nextIndex = Number.isInteger(currentIndex)
      ? Math.max(-1, Math.min(currentIndex, clonedGames.length - 1))
      : clonedGames.length - 1;

    this.history = clonedGames;
    this.moveNotation = clonedNotation;
    this.currentIndex = nextIndex;
  }

  /**
   * Record a new position (called after a complete turn).
   * This clears any future history if we're not at the end.
   */
  push(game: Game, notation?: string): void {
    // Remove any entries after current index (a new move after undoing)
    this.history = this.history.slice(0, this.currentIndex + 1);
    this.moveNotation = this.moveNotation.slice(0, this.currentIndex + 1);

    this.history.push(cloneGame(game));
    this.moveNotation.push(notation ?? "");
    this.currentIndex = this.history.length - 1;
  }

  /**
   * Go back one move. Returns the previous position, or null at the beginning.
   */
  undo(): Game | null {
    if (!this.canUndo()) return null;
    this.currentIndex--;
    return this.at(this.currentIndex);
  }

  /**
   * Go forward one move. Returns the next position, or null at the end.
   */
  redo(): Game | null {
    if (!this.canRedo()) return null;
    this.currentIndex++;
    return this.at(this.currentIndex);
  }

  jumpTo(index: number): Game | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.history.length) return null;
    this.currentIndex = index;
    return this.at(index);
  }

  canUndo(): boolean {
    return this.currentIndex > 0;
  }

  canRedo(): boolean {
    return this.currentIndex < this.history.length - 1;
  }

  /**
   * Get the current position without modifying history.
   */
  getCurrent(): Game | null {
    return this.at(this.currentIndex);
  }

  /**
   * History entries for display (e.g., a move list).
   */
  getHistory(): Array<{ index: number; toMove: Army; isCurrent: boolean; notation: string }> {
    return this.history.map((game, idx) => ({
      index: idx,
      toMove: currentArmy(game),
      isCurrent: idx === this.currentIndex,
      notation: this.moveNotation[idx] ?? "",
    }));
  }

  size(): number {
    return this.history.length;
  }

  getCurrentIndex(): number {
    return this.currentIndex;
  }

  clear(): void {
    this.history = [];
    this.moveNotation = [];
    this.currentIndex = -1;
  }

  private at(index: number): Game | null {
    const game = this.history[index];
    return game ? cloneGame(game) : null;
  }
}
