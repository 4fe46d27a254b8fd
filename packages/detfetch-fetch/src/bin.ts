#!/usr/bin/env node

import process from "node:process";

import { runFetchCli } from "./cli.js";

runFetchCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
