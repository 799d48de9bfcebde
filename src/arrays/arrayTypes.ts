import type { Army, Bitboard, PlayerId, Square } from "../types.ts";
import type { Placement } from "../game/board.ts";

export type ArrayId = "tablet_of_fire" | "tablet_of_water" | "tablet_of_air" | "tablet_of_earth";

/** A starting array, resolved to squares and bitboards. */
export interface ArraySpec {
  arrayId: ArrayId;
  displayName: string;
  description: string;
  turnOrder: readonly Army[];
  controllers: Record<Army, PlayerId>;
  thrones: Record<Army, [Square, Square]>;
  promotionZones: Record<Army, Bitboard>;
  placements: readonly Placement[];
}
