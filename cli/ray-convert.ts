#!/usr/bin/env -S tsx
import path from "node:path";
import { convertRayFile } from "../tools/ray-file-runner";
import { createCliObserver, ensureExtension, siblingWithExtension } from "../tools/ray-cli";

type CliArgs = {
  input?: string;
  out?: string;
};

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if ((token === "-i" || token === "--in") && args[i + 1]) {
      parsed.input = args[i + 1];
      i += 1;
    } else if ((token === "-o" || token === "--out") && args[i + 1]) {
      parsed.out = args[i + 1];
      i += 1;
    }
  }
  return parsed;
}

async function main() {
  const args = parseArgs();
  if (!args.input) {
    console.error("usage: ray-convert --in <file.dat> [--out <file.txt>]");
    process.exit(2);
  }
  const inputPath = path.resolve(args.input);
  const outputPath = ensureExtension(path.resolve(args.out ?? siblingWithExtension(inputPath, ".txt")), ".txt");

  const result = await convertRayFile(
    { input_path: inputPath, output_path: outputPath },
    { observer: createCliObserver() },
  );
  if (!result.ok) {
    console.error(`${result.code}: ${result.error}`);
    process.exit(1);
  }
  console.log(result.output_path);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
