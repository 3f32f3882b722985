#!/usr/bin/env node
import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { describeError } from "@llm-html/core";
import { runCli } from "./run";

// Load env from repo root first, then allow cwd overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`llm-html: ${describeError(e)}\n`);
    process.exitCode = 1;
  }
);
