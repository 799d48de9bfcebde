import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { GameSnapshot } from "../game/saveLoad.ts";
import { parseSnapshot } from "../game/saveLoad.ts";

export type PersistedSnapshotFile = {
  meta: {
    gameId: string;
    savedAt: string;
  };
  snapshot: GameSnapshot;
};

const GAME_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

function persistLog(message: string): void {
  if (process.env.ENOCHIAN_PERSIST_LOG === "1") {
    console.log(`[enochian] [persist] ${message}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function assertGameId(gameId: string): void {
  if (!GAME_ID_RE.test(gameId)) throw new Error(`Invalid game id: ${gameId}`);
}

export function resolveDefaultGamesDir(): string {
  // Default to <repo>/data/games
  const here = fileURLToPath(new URL(import.meta.url));
  return path.resolve(path.dirname(here), "..", "..", "data", "games");
}

export function resolveGamesDir(explicitDir?: string | undefined): string {
  if (explicitDir && explicitDir.trim()) return path.resolve(explicitDir);
  const fromEnv = process.env.ENOCHIAN_DATA_DIR;
  if (fromEnv && fromEnv.trim()) return path.resolve(fromEnv);
  return resolveDefaultGamesDir();
}

function gameDir(gamesDir: string, gameId: string): string {
  return path.join(gamesDir, gameId);
}

export function snapshotPath(gamesDir: string, gameId: string): string {
  assertGameId(gameId);
  return path.join(gameDir(gamesDir, gameId), `${gameId}.snapshot.json`);
}

/** Write to a temporary file beside the target, then rename over it. */
export async function writeSnapshotAtomic(gamesDir: string, gameId: string, snapshot: GameSnapshot): Promise<void> {
  const p = snapshotPath(gamesDir, gameId);
  const tmp = `${p}.tmp`;
  const file: PersistedSnapshotFile = { meta: { gameId, savedAt: new Date().toISOString() }, snapshot };
  try {
    await fs.mkdir(gameDir(gamesDir, gameId), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(file, null, 2), "utf8");
    await fs.rename(tmp, p);
  } catch (err) {
    console.error(`[enochian] failed to save game ${gameId}`, err);
    throw err;
  }
  persistLog(`saved game=${gameId}`);
}

/** The stored snapshot, or null when the game was never saved. Corrupt files throw. */
export async function tryLoadSnapshot(gamesDir: string, gameId: string): Promise<GameSnapshot | null> {
  const p = snapshotPath(gamesDir, gameId);
  let raw: string;
  try {
    raw = await fs.readFile(p, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    console.error(`[enochian] failed to read game ${gameId}`, err);
    throw err;
  }

  try {
    const file: unknown = JSON.parse(raw);
    if (typeof file !== "object" || file === null || !("snapshot" in file)) {
      throw new Error("Invalid save file: missing snapshot");
    }
    const snapshot = parseSnapshot(file.snapshot);
    persistLog(`loaded game=${gameId}`);
    return snapshot;
  } catch (err) {
    console.error(`[enochian] failed to load game ${gameId}`, err);
    throw err;
  }
}

/** Ids of every saved game under `gamesDir`, sorted. */
export async function listSavedGames(gamesDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(gamesDir, { withFileTypes: true });
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  const ids: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory() || !GAME_ID_RE.test(entry.name)) continue;
    const hasSnapshot = await fs
      .stat(snapshotPath(gamesDir, entry.name))
      .then(() => true)
      .catch(() => false);
    if (hasSnapshot) ids.push(entry.name);
  }
  return ids.sort();
}
