import { domainOf } from "./domains";
import { type CrosswordModel, type Variable, sameVariable } from "./types";
import type { Domains } from "./variable-map";

export type Arc = readonly [Variable, Variable];

/**
 * Makes `x` arc consistent with `y`: a word stays in x's domain only if some
 * different word in y's domain has the same letter at the shared cell.
 */
export function revise(
  model: CrosswordModel,
  domains: Domains,
  x: Variable,
  y: Variable,
): boolean {
  const overlap = model.overlap(x, y);
  if (overlap === null) return false;

  const [i, j] = overlap;
  const xWords = domainOf(domains, x);
  const yWords = domainOf(domains, y);
  let revised = false;

  for (const candidate of [...xWords]) {
    let supported = false;
    for (const other of yWords) {
      if (candidate !== other && candidate[i] === other[j]) {
        supported = true;
        break;
      }
    }
    if (!supported) {
      xWords.delete(candidate);
      revised = true;
    }
  }
  return revised;
}

export function initialArcs(model: CrosswordModel): Arc[] {
  const arcs: Arc[] = [];
  for (const x of model.variables) {
    for (const y of model.variables) {
      if (sameVariable(x, y)) continue;
      if (model.overlap(x, y) !== null) arcs.push([x, y]);
    }
  }
  return arcs;
}

/**
 * AC-3 over a FIFO worklist. Returns false as soon as a revision empties a
 * domain; true once the queue drains.
 */
export function ac3(
  model: CrosswordModel,
  domains: Domains,
  arcs?: readonly Arc[],
): boolean {
  const queue: Arc[] = arcs ? [...arcs] : initialArcs(model);
  let head = 0;

  while (head < queue.length) {
    const [x, y] = queue[head++];
    if (head > 1024 && head * 2 > queue.length) {
      queue.splice(0, head);
      head = 0;
    }
    if (!revise(model, domains, x, y)) continue;
    if (domainOf(domains, x).size === 0) return false;
    for (const z of model.neighbors(x)) {
      if (!sameVariable(z, y)) queue.push([z, x]);
    }
  }
  return true;
}
