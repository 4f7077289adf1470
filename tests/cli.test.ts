// ─── Command line tests ────────────────────────────────────────────────────

import pino from "pino";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { type CliIO, USAGE, runCli } from "../src/cli";
import { type AppConfig, loadConfig } from "../src/utils/config";
import logger from "../src/utils/logger";

interface MemoryIO extends CliIO {
  files: Map<string, string>;
  stdout: string[];
  stderr: string[];
}

function memoryIO(files: Record<string, string>): MemoryIO {
  const io: MemoryIO = {
    files: new Map(Object.entries(files)),
    stdout: [],
    stderr: [],
    async readFile(path) {
      const content = io.files.get(path);
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
    async writeFile(path, content) {
      io.files.set(path, content);
    },
    out: (line) => io.stdout.push(line),
    err: (line) => io.stderr.push(line),
  };
  return io;
}

const config: AppConfig = { logLevel: "silent", solver: { maxSearchNodes: 0 } };

const FILES = {
  "corner.txt": "___\n##_\n##_\n",
  "words.txt": "cat\ndog\ntan\n",
  "short.txt": "cat\ndog\n",
  "corner.yaml": 'structure:\n  - "___"\n  - "##_"\n  - "##_"\nwords: [cat, dog, tan]\n',
  "bare.yaml": 'structure:\n  - "___"\n  - "##_"\n  - "##_"\n',
  "broken.yaml": "name: nothing here\n",
};

// ─── runCli ────────────────────────────────────────────────────────────────

describe("runCli", () => {
  it("prints the filled grid", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.txt", "words.txt"], io, config)).toBe(0);
    expect(io.stdout).toEqual(["CAT\n██A\n██N"]);
  });

  it("writes the grid to an output file", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.txt", "words.txt", "out.txt"], io, config)).toBe(0);
    expect(io.files.get("out.txt")).toBe("CAT\n██A\n██N\n");
  });

  it("says so when there is no solution", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.txt", "short.txt"], io, config)).toBe(1);
    expect(io.stdout).toEqual(["No solution."]);
  });

  it("treats an exhausted budget as no solution", async () => {
    const io = memoryIO(FILES);
    const limited: AppConfig = { ...config, solver: { maxSearchNodes: 1 } };
    expect(await runCli(["corner.txt", "words.txt"], io, limited)).toBe(1);
    expect(io.stdout).toEqual(["No solution."]);
  });

  it("reads a YAML puzzle with inline words", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.yaml"], io, config)).toBe(0);
    expect(io.stdout).toEqual(["CAT\n██A\n██N"]);
  });

  it("reads the second argument as a word list even with inline words", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.yaml", "words.txt"], io, config)).toBe(0);
    expect(io.stdout).toEqual(["CAT\n██A\n██N"]);
    expect(io.files.get("words.txt")).toBe("cat\ndog\ntan\n");
    expect(io.files.size).toBe(Object.keys(FILES).length);
  });

  it("lets a word list file replace the inline words", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.yaml", "short.txt"], io, config)).toBe(1);
    expect(io.stdout).toEqual(["No solution."]);
    expect(io.files.get("short.txt")).toBe("cat\ndog\n");
  });

  it("writes a YAML puzzle's grid to the third argument", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["corner.yaml", "words.txt", "out.txt"], io, config)).toBe(0);
    expect(io.files.get("out.txt")).toBe("CAT\n██A\n██N\n");
  });

  it("reads a YAML puzzle with a separate word list", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["bare.yaml", "words.txt"], io, config)).toBe(0);
    expect(io.stdout).toEqual(["CAT\n██A\n██N"]);
  });

  it("rejects bad usage", async () => {
    const io = memoryIO(FILES);
    expect(await runCli([], io, config)).toBe(2);
    expect(await runCli(["corner.txt"], io, config)).toBe(2);
    expect(io.stderr).toEqual([USAGE, USAGE]);
  });

  it("rejects an invalid puzzle document", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["broken.yaml", "words.txt"], io, config)).toBe(2);
    expect(io.stderr).toEqual(["Invalid puzzle document"]);
  });

  it("reports an unreadable file on stderr", async () => {
    const io = memoryIO(FILES);
    expect(await runCli(["missing.txt", "words.txt"], io, config)).toBe(2);
    expect(io.stderr).toEqual(["Cannot read missing.txt: ENOENT: missing.txt"]);
    expect(io.stdout).toEqual([]);
  });
});

// ─── logger ────────────────────────────────────────────────────────────────

describe("logger", () => {
  it("writes to stderr so stdout only carries the grid", () => {
    const stream: unknown = Reflect.get(logger, pino.symbols.streamSym);
    expect(stream).toMatchObject({ fd: 2 });
  });
});

// ─── loadConfig ────────────────────────────────────────────────────────────

describe("loadConfig", () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env.CROSSWORD_MAX_SEARCH_NODES;
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it("defaults to an unlimited search", () => {
    expect(loadConfig().solver.maxSearchNodes).toBe(0);
  });

  it("reads the search budget from the environment", () => {
    process.env.CROSSWORD_MAX_SEARCH_NODES = "5000";
    expect(loadConfig().solver.maxSearchNodes).toBe(5000);
  });

  it("ignores a budget that is not a number", () => {
    process.env.CROSSWORD_MAX_SEARCH_NODES = "lots";
    expect(loadConfig().solver.maxSearchNodes).toBe(0);
  });

  it("takes the log level from LOG_LEVEL", () => {
    process.env.LOG_LEVEL = "debug";
    expect(loadConfig().logLevel).toBe("debug");
  });
});
