import logger from "../utils/logger";
import { type Arc, ac3, revise } from "./arc-consistency";
import { enforceNodeConsistency, initializeDomains } from "./domains";
import { CrosswordError } from "./errors";
import { backtrack, type SearchOutcome } from "./search";
import {
  type CrosswordModel,
  DEFAULT_SOLVER_OPTIONS,
  type SearchStats,
  type SolveStats,
  type SolverOptions,
  type Variable,
  variableKey,
} from "./types";
import { type Assignment, type Domains, VariableMap } from "./variable-map";

export type SolveResult =
  | { status: "solved"; assignment: Assignment; stats: SolveStats }
  | { status: "unsat"; reason: string; stats: SolveStats }
  | { status: "aborted"; reason: string; stats: SolveStats };

/**
 * Fills a crossword by node consistency, one AC-3 pass, then backtracking
 * search. Owns its domains; nothing is shared between solver instances.
 */
export class CrosswordSolver {
  readonly model: CrosswordModel;
  readonly domains: Domains;
  private readonly options: SolverOptions;

  constructor(model: CrosswordModel, options: Partial<SolverOptions> = {}) {
    for (const v of model.variables) {
      if (!Number.isInteger(v.length) || v.length <= 0) {
        throw new CrosswordError(
          `Variable ${variableKey(v)} has non-positive length`,
          "INVALID_VARIABLE",
          v,
        );
      }
    }
    this.model = model;
    this.options = { ...DEFAULT_SOLVER_OPTIONS, ...options };
    this.domains = initializeDomains(model.variables, model.words);
  }

  enforceNodeConsistency(): number {
    return enforceNodeConsistency(this.domains);
  }

  revise(x: Variable, y: Variable): boolean {
    return revise(this.model, this.domains, x, y);
  }

  ac3(arcs?: readonly Arc[]): boolean {
    return ac3(this.model, this.domains, arcs);
  }

  backtrack(
    assignment: Assignment = new VariableMap(),
    stats: SearchStats = { nodes: 0, backtracks: 0 },
  ): SearchOutcome {
    return backtrack(this.model, this.domains, assignment, this.options, stats);
  }

  solve(): SolveResult {
    const start = Date.now();
    const pruned = this.enforceNodeConsistency();
    // An emptied domain makes search fail on its own; no early exit here
    const arcConsistent = this.ac3();

    logger.debug(
      {
        variables: this.model.variables.length,
        words: this.model.words.size,
        pruned,
        arcConsistent,
        domainSizes: [...this.domains.values()].map((d) => d.size),
      },
      "preprocessing done",
    );

    const search: SearchStats = { nodes: 0, backtracks: 0 };
    const outcome = this.backtrack(new VariableMap(), search);
    const stats: SolveStats = {
      ...search,
      pruned,
      arcConsistent,
      elapsedMs: Date.now() - start,
    };

    logger.debug({ ...stats, found: outcome.found }, "search finished");

    if (outcome.found) {
      return { status: "solved", assignment: outcome.assignment, stats };
    }
    if (outcome.aborted) {
      return {
        status: "aborted",
        reason: `Search budget of ${this.options.maxSearchNodes} nodes reached`,
        stats,
      };
    }
    return {
      status: "unsat",
      reason: arcConsistent
        ? "No assignment satisfies every constraint"
        : "Arc consistency emptied a domain",
      stats,
    };
  }
}

export function solveCrossword(
  model: CrosswordModel,
  options: Partial<SolverOptions> = {},
): SolveResult {
  return new CrosswordSolver(model, options).solve();
}
