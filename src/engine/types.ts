export type Direction = "across" | "down";

export interface Variable {
  readonly row: number;
  readonly col: number;
  readonly direction: Direction;
  readonly length: number;
}

// [index in x's word, index in y's word]
export type Overlap = readonly [number, number];

export interface Pos {
  row: number;
  col: number;
}

/** What the solver needs to know about a puzzle */
export interface CrosswordModel {
  readonly variables: readonly Variable[];
  readonly words: ReadonlySet<string>;
  overlap(x: Variable, y: Variable): Overlap | null;
  neighbors(x: Variable): readonly Variable[];
}

export interface SearchStats {
  nodes: number;
  backtracks: number;
}

export interface SolveStats extends SearchStats {
  pruned: number;
  elapsedMs: number;
  arcConsistent: boolean;
}

export interface SolverOptions {
  // 0 = unlimited
  maxSearchNodes: number;
}

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  maxSearchNodes: 0,
};

export function variableKey(v: Variable): string {
  return `${v.row},${v.col},${v.direction},${v.length}`;
}

export function sameVariable(a: Variable, b: Variable): boolean {
  return (
    a.row === b.row &&
    a.col === b.col &&
    a.direction === b.direction &&
    a.length === b.length
  );
}

export function createVariable(
  row: number,
  col: number,
  direction: Direction,
  length: number,
): Variable {
  return Object.freeze({ row, col, direction, length });
}
