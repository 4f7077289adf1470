export { Crossword, parsePuzzle, parseStructure, parseWords } from "./crossword";
export type { ParsedPuzzle } from "./crossword";
export { CrosswordError } from "./errors";
export type { CrosswordErrorCode } from "./errors";
export { cloneDomains, enforceNodeConsistency, initializeDomains } from "./domains";
export { ac3, initialArcs, revise } from "./arc-consistency";
export type { Arc } from "./arc-consistency";
export {
  assignmentComplete,
  backtrack,
  consistent,
  orderDomainValues,
  selectUnassignedVariable,
} from "./search";
export type { SearchOutcome } from "./search";
export { CrosswordSolver, solveCrossword } from "./solver";
export type { SolveResult } from "./solver";
export { letterGrid, renderText } from "./render";
export { VariableMap } from "./variable-map";
export type { Assignment, Domains } from "./variable-map";
export {
  DEFAULT_SOLVER_OPTIONS,
  createVariable,
  sameVariable,
  variableKey,
} from "./types";
export type {
  CrosswordModel,
  Direction,
  Overlap,
  Pos,
  SearchStats,
  SolveStats,
  SolverOptions,
  Variable,
} from "./types";
