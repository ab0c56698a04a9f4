#!/usr/bin/env -S tsx
import path from "node:path";
import { inspectRayFile } from "../tools/ray-file-runner";

function parseArgs(): { input?: string } {
  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i += 1) {
    if ((args[i] === "-i" || args[i] === "--in") && args[i + 1]) {
      return { input: args[i + 1] };
    }
  }
  return { input: args.find((arg) => !arg.startsWith("-")) };
}

async function main() {
  const { input } = parseArgs();
  if (!input) {
    console.error("usage: ray-inspect --in <file>");
    process.exit(2);
  }
  const result = await inspectRayFile({ input_path: path.resolve(input) });
  if (!result.ok) {
    console.error(`${result.code}: ${result.error}`);
    process.exit(1);
  }
  console.log(JSON.stringify(result.summary, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
