#!/usr/bin/env -S tsx

import fs from "node:fs/promises";
import { runBicycleCalc } from "../tools/bicycle-calc-runner";

async function main() {
  const code = await runBicycleCalc(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readFile: (filePath) => fs.readFile(filePath, "utf8"),
    env: process.env,
  });
  process.exitCode = code;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
