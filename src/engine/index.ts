// Public engine surface

export { Board } from "./board";
export { listLegalMoves, candidateConstraints } from "./legalMoves";

export { NUM_ROWS, NUM_COLS, DIRECTIONS, MOVE_SHAPES, REGION_CONSTRAINTS, STARTING_LAYOUT } from "./constants";
export { coord, coordsEqual, onGrid, stepFrom, inConstrainedRegion } from "./geometry";
export { appliesTo, inducedBy, isFinal, permits } from "./regionConstraint";
export { footprint, inBounds, coveredCells } from "./moveShape";

export { opponent, winOf, winnerOf, PLAYERS } from "./player";
export { search, searchAlphaBeta, analyzeResponses } from "./search";
export type { SearchFn } from "./search";

export { formatCoordinate, formatConstraint, formatMove, formatOutcome } from "./notation";
export { hashBoard } from "./stateHash";
export { layoutFromRows, movesEqual } from "./stateUtils";
export { validateBoard, assertBoardConsistent } from "./validateState";

// Move envelope + try-apply
export { EngineInvariantError } from "./errors";
export type { MoveResponse, EngineError, EngineErrorCode } from "./errors";
export { tryMakeMove } from "./tryApply";
