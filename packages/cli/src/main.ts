#!/usr/bin/env -S node --import tsx
import { execute } from "./program.js";

execute(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdin: process.stdin,
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Unexpected failure:", err);
    process.exitCode = 1;
  });
