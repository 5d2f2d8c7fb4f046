#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./cli/run.js";
import { errorMessage } from "./mapping/errors.js";

void runCli(process.argv, { stdout: process.stdout, stderr: process.stderr }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  },
);
