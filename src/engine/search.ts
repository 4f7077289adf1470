import { domainOf } from "./domains";
import {
  type CrosswordModel,
  DEFAULT_SOLVER_OPTIONS,
  type SearchStats,
  type SolverOptions,
  type Variable,
} from "./types";
import type { Assignment, Domains } from "./variable-map";

export type SearchOutcome =
  | { found: true; assignment: Assignment }
  | { found: false; aborted: boolean };

export function assignmentComplete(
  model: CrosswordModel,
  assignment: Assignment,
): boolean {
  return model.variables.every((v) => assignment.has(v));
}

/**
 * True when every assigned word has its slot's length, agrees with every
 * assigned neighbour at their shared cell, and no word is used twice.
 * Unassigned neighbours are ignored.
 */
export function consistent(model: CrosswordModel, assignment: Assignment): boolean {
  const used = new Set<string>();

  for (const [variable, word] of assignment) {
    if (word.length !== variable.length) return false;
    if (used.has(word)) return false;
    used.add(word);

    for (const neighbor of model.neighbors(variable)) {
      const other = assignment.get(neighbor);
      if (other === undefined) continue;
      const overlap = model.overlap(variable, neighbor);
      if (overlap === null) continue;
      const [i, j] = overlap;
      if (word[i] !== other[j]) return false;
    }
  }
  return true;
}

/**
 * Minimum remaining values, then highest degree. Remaining ties go to the
 * variable listed first by the model so runs are reproducible.
 */
export function selectUnassignedVariable(
  model: CrosswordModel,
  domains: Domains,
  assignment: Assignment,
): Variable | null {
  let best: Variable | null = null;
  let bestSize = Infinity;
  let bestDegree = -1;

  for (const v of model.variables) {
    if (assignment.has(v)) continue;
    const size = domainOf(domains, v).size;
    const degree = model.neighbors(v).length;
    if (size < bestSize || (size === bestSize && degree > bestDegree)) {
      best = v;
      bestSize = size;
      bestDegree = degree;
    }
  }
  return best;
}

/**
 * Least-constraining value first. A neighbour candidate counts as ruled out
 * when it is the same word or disagrees at the shared cell.
 */
export function orderDomainValues(
  model: CrosswordModel,
  domains: Domains,
  variable: Variable,
  assignment: Assignment,
): string[] {
  const values = [...domainOf(domains, variable)];
  const ruledOut = new Map<string, number>();

  for (const value of values) {
    let count = 0;
    for (const neighbor of model.neighbors(variable)) {
      if (assignment.has(neighbor)) continue;
      const overlap = model.overlap(variable, neighbor);
      if (overlap === null) continue;
      const [i, j] = overlap;
      if (value.length <= i) continue;
      for (const choice of domainOf(domains, neighbor)) {
        if (choice === value || value[i] !== choice[j]) count++;
      }
    }
    ruledOut.set(value, count);
  }

  // Array#sort is stable, so ties keep domain order
  return values.sort((a, b) => (ruledOut.get(a) ?? 0) - (ruledOut.get(b) ?? 0));
}

/**
 * Depth-first backtracking from a partial assignment. On success the returned
 * assignment is the same object, completed in place; on failure it is left as
 * it was passed in.
 */
export function backtrack(
  model: CrosswordModel,
  domains: Domains,
  assignment: Assignment,
  options: SolverOptions = DEFAULT_SOLVER_OPTIONS,
  stats: SearchStats = { nodes: 0, backtracks: 0 },
): SearchOutcome {
  const maxNodes = options.maxSearchNodes;
  let aborted = false;

  function dfs(): boolean {
    if (assignmentComplete(model, assignment)) return true;

    const variable = selectUnassignedVariable(model, domains, assignment);
    if (variable === null) return false;

    for (const word of orderDomainValues(model, domains, variable, assignment)) {
      if (maxNodes > 0 && stats.nodes >= maxNodes) {
        aborted = true;
        return false;
      }
      stats.nodes++;

      assignment.set(variable, word);
      let keep = false;
      try {
        if (consistent(model, assignment)) {
          keep = dfs();
          if (keep) return true;
          if (aborted) return false;
        }
      } finally {
        if (!keep) assignment.delete(variable);
      }
      stats.backtracks++;
    }
    return false;
  }

  if (!consistent(model, assignment)) return { found: false, aborted: false };
  if (dfs()) return { found: true, assignment };
  return { found: false, aborted };
}
