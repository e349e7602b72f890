#!/usr/bin/env node
import { CxError } from "../types";
import { parseArgs } from "./utils/args";
import { error } from "./utils/colors";
import { run } from "./run";

run(parseArgs(process.argv.slice(2)))
  .then((code) => {
    if (code !== 0) process.exit(code);
  })
  .catch((err: unknown) => {
    if (err instanceof CxError) {
      error(`${err.code}: ${err.message}`);
    } else {
      error(err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
  });
