import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Completion, LLMProvider, Prompt, ProviderError, ResponseCache } from "@llm-html/core";
import { CliDeps, RunStats, runCli } from "../run";

function upperCase(): LLMProvider {
  return {
    kind: "local",
    async submit(prompt: Prompt): Promise<Completion> {
      const parsed: unknown = JSON.parse(prompt.user);
      if (!Array.isArray(parsed)) throw new Error("user message is not an array");
      const text = JSON.stringify(parsed.map((s) => String(s).toUpperCase()));
      return { text, usage: { tokens_in: 10, tokens_out: 5 } };
    },
  };
}

const failing: LLMProvider = {
  kind: "local",
  submit: async () => {
    throw new ProviderError({ code: "auth", message: "bad key", retryable: false, status: 401 });
  },
};

let dir: string;
let stderr: string[];
let stdout: string[];

function deps(provider: LLMProvider = upperCase()): CliDeps {
  return {
    env: {},
    stderr: (line) => stderr.push(line),
    stdout: (line) => stdout.push(line),
    providerFactory: () => provider,
    cache: new ResponseCache(),
  };
}

const read = (...parts: string[]) => fs.readFile(path.join(dir, ...parts), "utf8");

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "llm-html-cli-"));
  stderr = [];
  stdout = [];
  await fs.mkdir(path.join(dir, "in", "sub"), { recursive: true });
  await fs.writeFile(path.join(dir, "in", "a.html"), "<p>hello world</p>", "utf8");
  await fs.writeFile(path.join(dir, "in", "sub", "b.html"), "<p>nested file</p>", "utf8");
  await fs.writeFile(path.join(dir, "in", "notes.txt"), "not html", "utf8");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("runCli", () => {
  it("rewrites a directory recursively in place and writes stats", async () => {
    const statsFile = path.join(dir, "stats.json");
    const code = await runCli([path.join(dir, "in"), "-r", "--stats-file", statsFile, "--log-level", "silent"], deps());

    expect(code).toBe(0);
    expect(await read("in", "a.html")).toBe("<p>HELLO WORLD</p>");
    expect(await read("in", "sub", "b.html")).toBe("<p>NESTED FILE</p>");
    expect(await read("in", "notes.txt")).toBe("not html");

    const stats: RunStats = JSON.parse(await read("stats.json"));
    expect(stats.files.map((f) => f.file)).toEqual([
      path.join(dir, "in", "a.html"),
      path.join(dir, "in", "sub", "b.html"),
    ]);
    expect(stats).toMatchObject({ total_tokens_in: 20, total_tokens_out: 10, cache_hits: 0, errors: 0 });
  });

  it("skips subdirectories unless recursive", async () => {
    const code = await runCli([path.join(dir, "in"), "--log-level", "silent"], deps());
    expect(code).toBe(0);
    expect(await read("in", "a.html")).toBe("<p>HELLO WORLD</p>");
    expect(await read("in", "sub", "b.html")).toBe("<p>nested file</p>");
  });

  it("mirrors the input tree under the output directory", async () => {
    const out = path.join(dir, "out");
    const code = await runCli([path.join(dir, "in"), "-r", "-o", out, "--log-level", "silent"], deps());

    expect(code).toBe(0);
    expect(await read("out", "a.html")).toBe("<p>HELLO WORLD</p>");
    expect(await read("out", "sub", "b.html")).toBe("<p>NESTED FILE</p>");
    expect(await read("in", "a.html")).toBe("<p>hello world</p>");
  });

  it("writes a single file to the output path", async () => {
    const out = path.join(dir, "single.html");
    const code = await runCli([path.join(dir, "in", "a.html"), "-o", out, "--log-level", "silent"], deps());
    expect(code).toBe(0);
    expect(await read("single.html")).toBe("<p>HELLO WORLD</p>");
  });

  it.each([
    { name: "no input", argv: [] },
    { name: "an unknown task", argv: ["x.html", "--task", "bogus"] },
    { name: "a non-numeric temperature", argv: ["x.html", "--temperature", "hot"] },
    { name: "translate without a target", argv: ["x.html", "--task", "translate"] },
    { name: "an unknown flag", argv: ["x.html", "--frobnicate"] },
  ])("exits 2 on $name", async ({ argv }) => {
    expect(await runCli(argv, deps())).toBe(2);
    expect(stderr[stderr.length - 1]).toContain("Usage: llm-html");
  });

  it("exits 1 when a file fails", async () => {
    const statsFile = path.join(dir, "stats.json");
    const code = await runCli([path.join(dir, "in", "a.html"), "--stats-file", statsFile, "--log-level", "silent"], deps(failing));

    expect(code).toBe(1);
    expect(await read("in", "a.html")).toBe("<p>hello world</p>");
    const stats: RunStats = JSON.parse(await read("stats.json"));
    expect(stats.errors).toBe(1);
    expect(stats.files[0]).toMatchObject({ status: "error" });
  });

  it("exits 1 when the input does not exist", async () => {
    expect(await runCli([path.join(dir, "missing.html"), "--log-level", "silent"], deps())).toBe(1);
  });

  it("appends log lines to the log file", async () => {
    const logFile = path.join(dir, "logs", "run.log");
    const code = await runCli([path.join(dir, "in", "a.html"), "--log-file", logFile, "--log-level", "info"], deps());

    expect(code).toBe(0);
    const lines = (await read("logs", "run.log")).trim().split("\n");
    expect(lines[lines.length - 1]).toContain("INFO cli - run.done");
    expect(stderr).toEqual(lines);
  });

  it("prints usage on --help", async () => {
    expect(await runCli(["--help"], deps())).toBe(0);
    expect(stdout[0]).toContain("Usage: llm-html");
  });
});
