import type { Army, Bitboard, PlayerId, Square } from "../types.ts";
import { ARMIES, PIECE_KINDS, isArmy, perArmy } from "../types.ts";
import type { Placement } from "../game/board.ts";
import { bit } from "../game/bitboard.ts";
import { EDGE_MASK, isEdge, parseSquare } from "../game/coords.ts";
import type { ArrayId, ArraySpec } from "./arrayTypes.ts";
import catalog from "./arrays.json";

const ARRAY_IDS: readonly ArrayId[] = ["tablet_of_fire", "tablet_of_water", "tablet_of_air", "tablet_of_earth"];

export const DEFAULT_ARRAY_ID: ArrayId = "tablet_of_fire";

export function isArrayId(id: string): id is ArrayId {
  return (ARRAY_IDS as readonly string[]).includes(id);
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function field(raw: Record<string, unknown>, key: string, where: string): unknown {
  if (!(key in raw)) throw new Error(`Invalid array ${where}: missing ${key}`);
  return raw[key];
}

function asString(raw: unknown, where: string): string {
  if (typeof raw !== "string") throw new Error(`Invalid array ${where}: expected a string`);
  return raw;
}

function asRecord(raw: unknown, where: string): Record<string, unknown> {
  if (!isRecord(raw)) throw new Error(`Invalid array ${where}: expected an object`);
  return raw;
}

function asSquares(raw: unknown, where: string): Square[] {
  if (!Array.isArray(raw)) throw new Error(`Invalid array ${where}: expected a list of squares`);
  return raw.map((s) => parseSquare(asString(s, where)));
}

function asPlayerId(raw: unknown, where: string): PlayerId {
  if (raw === 1 || raw === 2) return raw;
  throw new Error(`Invalid array ${where}: controller must be 1 or 2`);
}

/** Resolve one catalog entry (square names, edge names) into an `ArraySpec`. */
export function parseArrayEntry(raw: unknown): ArraySpec {
  const entry = asRecord(raw, "entry");
  const arrayId = asString(field(entry, "arrayId", "entry"), "arrayId");
  if (!isArrayId(arrayId)) throw new Error(`Unknown arrayId: ${arrayId}`);
  const where = arrayId;

  const orderRaw = field(entry, "turnOrder", where);
  if (!Array.isArray(orderRaw)) throw new Error(`Invalid array ${where}: turnOrder must be a list`);
  const turnOrder: Army[] = orderRaw.map((a) => {
    if (!isArmy(a)) throw new Error(`Invalid array ${where}: unknown army ${String(a)}`);
    return a;
  });

  const controllersRaw = asRecord(field(entry, "controllers", where), `${where}.controllers`);
  const thronesRaw = asRecord(field(entry, "thrones", where), `${where}.thrones`);
  const zonesRaw = asRecord(field(entry, "promotionZones", where), `${where}.promotionZones`);
  const placementsRaw = asRecord(field(entry, "placements", where), `${where}.placements`);

  const controllers = perArmy((army) => asPlayerId(controllersRaw[army], `${where}.controllers.${army}`));

  const thrones = perArmy((army): [Square, Square] => {
    const squares = asSquares(thronesRaw[army], `${where}.thrones.${army}`);
    const [first, second] = squares;
    if (squares.length !== 2 || first === undefined || second === undefined) {
      throw new Error(`Invalid array ${where}: ${army} needs exactly two throne squares`);
    }
    return [first, second];
  });

  const promotionZones = perArmy((army): Bitboard => {
    const edge = zonesRaw[army];
    if (!isEdge(edge)) throw new Error(`Invalid array ${where}: unknown promotion zone for ${army}`);
    return EDGE_MASK[edge];
  });

  const placements: Placement[] = [];
  for (const army of ARMIES) {
    const byKind = placementsRaw[army];
    if (byKind === undefined) continue;
    const kinds = asRecord(byKind, `${where}.placements.${army}`);
    for (const piece of PIECE_KINDS) {
      if (kinds[piece] === undefined) continue;
      let squares = 0n;
      for (const sq of asSquares(kinds[piece], `${where}.placements.${army}.${piece}`)) squares |= bit(sq);
      placements.push({ army, piece, squares });
    }
  }

  return {
    arrayId,
    displayName: asString(field(entry, "displayName", where), `${where}.displayName`),
    description: asString(field(entry, "description", where), `${where}.description`),
    turnOrder,
    controllers,
    thrones,
    promotionZones,
    placements,
  };
}

export const ARRAYS: readonly ArraySpec[] = Object.freeze(catalog.arrays.map((raw) => parseArrayEntry(raw)));

export function getArrayById(id: ArrayId): ArraySpec {
  const found = ARRAYS.find((a) => a.arrayId === id);
  if (!found) throw new Error(`Unknown arrayId: ${id}`);
  return found;
}

/** Case-insensitive lookup by display name or id. */
export function findArrayByName(name: string): ArraySpec | null {
  const wanted = name.trim().toLowerCase();
  return ARRAYS.find((a) => a.displayName.toLowerCase() === wanted || a.arrayId === wanted) ?? null;
}

/** The catalog entry `direction` steps away from `id`, wrapping around. */
export function nextArrayId(id: ArrayId, direction: 1 | -1): ArrayId {
  const idx = ARRAYS.findIndex((a) => a.arrayId === id);
  const len = ARRAYS.length;
  const next = ARRAYS[(((idx < 0 ? 0 : idx) + direction) % len + len) % len];
  if (!next) throw new Error("Array catalog is empty");
  return next.arrayId;
}
