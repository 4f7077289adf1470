import { readFile, writeFile } from "node:fs/promises";
import {
  Crossword,
  CrosswordError,
  parsePuzzle,
  parseStructure,
  parseWords,
  renderText,
  solveCrossword,
} from "./engine/index";
import { type AppConfig, loadConfig } from "./utils/config";
import logger from "./utils/logger";

export const USAGE =
  "Usage: crossword-csp <structure|puzzle.yaml> [words] [output]";

export interface CliIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  out(line: string): void;
  err(line: string): void;
}

export const nodeIO: CliIO = {
  readFile: (path) => readFile(path, "utf8"),
  writeFile: (path, content) => writeFile(path, content, "utf8"),
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function isPuzzleFile(path: string): boolean {
  return /\.ya?ml$/i.test(path);
}

async function readInput(io: CliIO, path: string): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CrosswordError(`Cannot read ${path}: ${message}`, "UNREADABLE_INPUT", { path });
  }
}

async function loadCrossword(args: string[], io: CliIO): Promise<{ crossword: Crossword; output?: string }> {
  const [first, second, output] = args;

  if (isPuzzleFile(first)) {
    const puzzle = parsePuzzle(await readInput(io, first));
    // A word list on the command line replaces any inline one
    const words = second === undefined ? undefined : parseWords(await readInput(io, second));
    return { crossword: Crossword.fromPuzzle(puzzle, words), output };
  }

  if (second === undefined) throw new CrosswordError(USAGE, "INVALID_PUZZLE");
  const structure = parseStructure(await readInput(io, first));
  const words = parseWords(await readInput(io, second));
  return { crossword: new Crossword(structure, words), output };
}

/** Exit codes: 0 solved, 1 no solution or budget reached, 2 usage or input error. */
export async function runCli(
  args: string[],
  io: CliIO = nodeIO,
  config: AppConfig = loadConfig(),
): Promise<number> {
  if (args.length < 1 || args.length > 3) {
    io.err(USAGE);
    return 2;
  }

  let loaded: { crossword: Crossword; output?: string };
  try {
    loaded = await loadCrossword(args, io);
  } catch (err) {
    if (err instanceof CrosswordError) {
      logger.debug({ code: err.code, details: err.details }, "input rejected");
      io.err(err.message);
      return 2;
    }
    throw err;
  }

  const { crossword, output } = loaded;
  const result = solveCrossword(crossword, config.solver);

  if (result.status !== "solved") {
    logger.info({ status: result.status, ...result.stats }, result.reason);
    io.out("No solution.");
    return 1;
  }

  const text = renderText(crossword, result.assignment);
  io.out(text);
  if (output) {
    await io.writeFile(output, `${text}\n`);
    logger.info({ output }, "solution written");
  }
  return 0;
}
