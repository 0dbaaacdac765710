#!/usr/bin/env node
import { createProgram } from "./program.js";

createProgram().parseAsync(process.argv).catch((e) => {
  console.error(e);
  process.exit(1);
});
