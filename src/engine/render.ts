import type { Crossword } from "./crossword";
import type { Assignment } from "./variable-map";

const BLOCK = "█";

export function letterGrid(crossword: Crossword, assignment: Assignment): (string | null)[][] {
  const letters: (string | null)[][] = Array.from({ length: crossword.height }, () =>
    new Array<string | null>(crossword.width).fill(null),
  );
  for (const [variable, word] of assignment) {
    crossword.cells(variable).forEach((pos, k) => {
      if (k < word.length) letters[pos.row][pos.col] = word[k];
    });
  }
  return letters;
}

/** One line per row: blocks as `█`, unfilled open cells as spaces. */
export function renderText(crossword: Crossword, assignment: Assignment): string {
  const letters = letterGrid(crossword, assignment);
  const lines: string[] = [];
  for (let r = 0; r < crossword.height; r++) {
    let line = "";
    for (let c = 0; c < crossword.width; c++) {
      line += crossword.isOpen(r, c) ? letters[r][c] ?? " " : BLOCK;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
