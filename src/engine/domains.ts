import { CrosswordError } from "./errors";
import type { Variable } from "./types";
import { type Domains, VariableMap } from "./variable-map";

export function initializeDomains(
  variables: Iterable<Variable>,
  words: Iterable<string>,
): Domains {
  const list = [...words];
  const domains: Domains = new VariableMap();
  for (const v of variables) {
    // Each variable gets its own set; pruning one must not touch another
    domains.set(v, new Set(list));
  }
  return domains;
}

export function cloneDomains(domains: Domains): Domains {
  return domains.clone((words) => new Set(words));
}

/** Drops every word whose length differs from its variable's. Returns the prune count. */
export function enforceNodeConsistency(domains: Domains): number {
  let pruned = 0;
  for (const [variable, words] of domains) {
    for (const word of [...words]) {
      if (word.length !== variable.length) {
        words.delete(word);
        pruned++;
      }
    }
  }
  return pruned;
}

export function domainOf(domains: Domains, variable: Variable): Set<string> {
  const words = domains.get(variable);
  if (!words) {
    throw new CrosswordError(
      `No domain for variable at ${variable.row},${variable.col} (${variable.direction})`,
      "UNKNOWN_VARIABLE",
      variable,
    );
  }
  return words;
}
