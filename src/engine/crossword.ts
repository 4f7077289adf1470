import YAML from "yaml";
import { z } from "zod";
import { CrosswordError } from "./errors";
import {
  type CrosswordModel,
  type Direction,
  type Overlap,
  type Pos,
  type Variable,
  createVariable,
  variableKey,
} from "./types";

const OPEN_CELL = "_";

/** `_` marks an open cell; anything else is blocked. Short rows are padded with blocks. */
export function parseStructure(text: string): boolean[][] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
  if (lines.length === 0) {
    throw new CrosswordError("Structure has no rows", "INVALID_STRUCTURE");
  }

  const width = Math.max(...lines.map((line) => line.length));
  return lines.map((line) => {
    const row: boolean[] = [];
    for (let c = 0; c < width; c++) row.push(line[c] === OPEN_CELL);
    return row;
  });
}

export function parseWords(text: string): string[] {
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim().toUpperCase();
    if (word) seen.add(word);
  }
  return [...seen];
}

const PuzzleSchema = z.object({
  name: z.string().optional(),
  structure: z.array(z.string()).min(1),
  words: z.array(z.string()).optional(),
});

export interface ParsedPuzzle {
  name?: string;
  structure: boolean[][];
  words?: string[];
}

export function parsePuzzle(text: string): ParsedPuzzle {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CrosswordError(`Puzzle is not valid YAML: ${message}`, "INVALID_PUZZLE");
  }

  const result = PuzzleSchema.safeParse(raw);
  if (!result.success) {
    throw new CrosswordError("Invalid puzzle document", "INVALID_PUZZLE", result.error.issues);
  }

  const doc = result.data;
  return {
    name: doc.name,
    structure: parseStructure(doc.structure.join("\n")),
    words: doc.words ? parseWords(doc.words.join("\n")) : undefined,
  };
}

interface CellSlot {
  variableIndex: number;
  letterIndex: number;
}

export class Crossword implements CrosswordModel {
  readonly height: number;
  readonly width: number;
  readonly structure: readonly (readonly boolean[])[];
  readonly words: ReadonlySet<string>;
  readonly variables: readonly Variable[];
  private readonly indexByKey = new Map<string, number>();
  private readonly overlaps = new Map<string, Overlap>();
  private readonly neighborLists: Variable[][];

  constructor(structure: boolean[][], words: Iterable<string>) {
    if (structure.length === 0 || structure[0].length === 0) {
      throw new CrosswordError("Structure has no cells", "INVALID_STRUCTURE");
    }
    const width = structure[0].length;
    structure.forEach((row, r) => {
      if (row.length !== width) {
        throw new CrosswordError(
          `Row ${r} has ${row.length} cells, expected ${width}`,
          "INVALID_STRUCTURE",
        );
      }
    });

    this.height = structure.length;
    this.width = width;
    this.structure = structure.map((row) => [...row]);
    this.words = new Set(words);
    this.variables = this.findVariables();
    this.variables.forEach((v, i) => this.indexByKey.set(variableKey(v), i));
    this.neighborLists = this.variables.map(() => []);
    this.computeOverlaps();
  }

  static fromText(structureText: string, wordsText: string): Crossword {
    return new Crossword(parseStructure(structureText), parseWords(wordsText));
  }

  static fromPuzzle(puzzle: ParsedPuzzle, words?: Iterable<string>): Crossword {
    const list = words ?? puzzle.words;
    if (!list) {
      throw new CrosswordError("Puzzle has no word list", "INVALID_PUZZLE");
    }
    return new Crossword(puzzle.structure, list);
  }

  isOpen(row: number, col: number): boolean {
    return (
      row >= 0 &&
      row < this.height &&
      col >= 0 &&
      col < this.width &&
      this.structure[row][col]
    );
  }

  cells(variable: Variable): Pos[] {
    const cells: Pos[] = [];
    for (let k = 0; k < variable.length; k++) {
      cells.push({
        row: variable.row + (variable.direction === "down" ? k : 0),
        col: variable.col + (variable.direction === "across" ? k : 0),
      });
    }
    return cells;
  }

  overlap(x: Variable, y: Variable): Overlap | null {
    const xi = this.indexOf(x);
    const yi = this.indexOf(y);
    return this.overlaps.get(`${xi}:${yi}`) ?? null;
  }

  neighbors(x: Variable): readonly Variable[] {
    return this.neighborLists[this.indexOf(x)];
  }

  private indexOf(variable: Variable): number {
    const index = this.indexByKey.get(variableKey(variable));
    if (index === undefined) {
      throw new CrosswordError(
        `Variable ${variableKey(variable)} is not part of this crossword`,
        "UNKNOWN_VARIABLE",
        variable,
      );
    }
    return index;
  }

  private runLength(row: number, col: number, direction: Direction): number {
    let length = 0;
    let r = row;
    let c = col;
    while (this.isOpen(r, c)) {
      length++;
      if (direction === "down") r++;
      else c++;
    }
    return length;
  }

  // Row-major; a cell starting both kinds of slot yields the down slot first
  private findVariables(): Variable[] {
    const variables: Variable[] = [];
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        if (!this.structure[r][c]) continue;

        if (!this.isOpen(r - 1, c)) {
          const length = this.runLength(r, c, "down");
          if (length > 1) variables.push(createVariable(r, c, "down", length));
        }
        if (!this.isOpen(r, c - 1)) {
          const length = this.runLength(r, c, "across");
          if (length > 1) variables.push(createVariable(r, c, "across", length));
        }
      }
    }
    return variables;
  }

  private computeOverlaps(): void {
    const slotsByCell = new Map<string, CellSlot[]>();
    this.variables.forEach((v, variableIndex) => {
      this.cells(v).forEach((pos, letterIndex) => {
        const key = `${pos.row},${pos.col}`;
        const list = slotsByCell.get(key) ?? [];
        list.push({ variableIndex, letterIndex });
        slotsByCell.set(key, list);
      });
    });

    for (const slots of slotsByCell.values()) {
      for (const a of slots) {
        for (const b of slots) {
          if (a.variableIndex === b.variableIndex) continue;
          this.overlaps.set(`${a.variableIndex}:${b.variableIndex}`, [
            a.letterIndex,
            b.letterIndex,
          ]);
        }
      }
    }

    // Neighbour lists follow variable order
    for (let i = 0; i < this.variables.length; i++) {
      for (let j = 0; j < this.variables.length; j++) {
        if (i !== j && this.overlaps.has(`${i}:${j}`)) {
          this.neighborLists[i].push(this.variables[j]);
        }
      }
    }
  }
}
