// "Core" is the stable, deterministic rules surface (no I/O, no rendering beyond text).

export type { Army, Bitboard, Piece, PieceKind, PlayerId, Square, Team } from "../types.ts";
export { ARMIES, ARMY_NAME, PIECE_KINDS, PIECE_NAME, TEAMS, TEAM_NAME, allyOf, opponentTeam, teamOf } from "../types.ts";

export type { ArmyMeta, BoardState, Placement } from "../game/board.ts";
export { createBoard, createEmptyBoard, isBoardConsistent, pieceAt, pieceCounts } from "../game/board.ts";
export { parseSquare, squareName } from "../game/coords.ts";

export type { Game, GameConfig, GameState } from "../game/state.ts";
export { DEFAULT_CONFIG, createGame, createGameFromArray, currentArmy, refreshDerivedState } from "../game/state.ts";

export type { ApplyMoveResult, Move, MoveErrorCode } from "../game/moveTypes.ts";
export { generateLegalMoves, mustMoveKing } from "../game/legalMoves.ts";
export { isKingInCheck } from "../game/attacks.ts";
export { applyMove } from "../game/applyMove.ts";
export type { PromotionTarget } from "../game/promote.ts";
export { isPrivilegedPawn, promotionTargets } from "../game/promote.ts";
export type { ExchangeResult } from "../game/throne.ts";
export { captureKing, exchangePrisoners, restoreKingToThrone } from "../game/throne.ts";

export type { ArmyStatus } from "../game/status.ts";
export { armyStatus, describeSquare, isArmyFrozen, isArmyStalemated, statusSummary } from "../game/status.ts";
export type { Outcome } from "../game/gameOver.ts";
export { getOutcome, isDraw, winningTeam } from "../game/gameOver.ts";

export type { MoveText } from "../game/coordFormat.ts";
export { formatMove, parseMoveText } from "../game/coordFormat.ts";
export { asciiBoard, asciiRows } from "../render/asciiBoard.ts";

export type { GameSnapshot } from "../game/saveLoad.ts";
export { deserializeGame, gameFromJson, gameToJson, loadGame, parseSnapshot, serializeGame } from "../game/saveLoad.ts";

export type { ArrayId, ArraySpec } from "../arrays/arrayTypes.ts";
export {
  ARRAYS,
  DEFAULT_ARRAY_ID,
  findArrayByName,
  getArrayById,
  isArrayId,
  nextArrayId,
} from "../arrays/arrayRegistry.ts";
