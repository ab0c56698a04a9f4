#!/usr/bin/env -S tsx
import path from "node:path";
import { RayOutputFormat, RaySamplingMethod } from "@shared/ray-file";
import { resolveRayConfig } from "../server/config/env";
import { defaultExtensionFor } from "../server/services/rays/output-writer";
import { isBinaryInputPath } from "../server/services/rays/subsample-job";
import { convertRayFile, subsampleRayFile } from "../tools/ray-file-runner";
import { createCliObserver, ensureExtension, siblingWithExtension } from "../tools/ray-cli";

type CliArgs = {
  input?: string;
  out?: string;
  target?: string;
  format?: string;
  method?: string;
  seed?: string;
  convert?: boolean;
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
    } else if ((token === "-n" || token === "--target") && args[i + 1]) {
      parsed.target = args[i + 1];
      i += 1;
    } else if ((token === "-f" || token === "--format") && args[i + 1]) {
      parsed.format = args[i + 1];
      i += 1;
    } else if ((token === "-m" || token === "--method") && args[i + 1]) {
      parsed.method = args[i + 1];
      i += 1;
    } else if (token === "--seed" && args[i + 1]) {
      parsed.seed = args[i + 1];
      i += 1;
    } else if (token === "--convert") {
      parsed.convert = true;
    }
  }
  return parsed;
}

const USAGE =
  "usage: ray-subsample --in <file.txt> --target <n> --out <file> " +
  "[--format ascii|foreign_ascii|native_binary] [--method random|angular_stratified] [--seed <s>] [--convert]";

async function main() {
  const args = parseArgs();
  if (!args.input || !args.out || !args.target) {
    console.error(USAGE);
    process.exit(2);
  }
  const format = RayOutputFormat.parse(args.format ?? "ascii");
  const method = RaySamplingMethod.parse(args.method ?? "random");
  const observer = createCliObserver();

  let inputPath = path.resolve(args.input);
  if (args.convert && isBinaryInputPath(inputPath, resolveRayConfig().binary_extensions)) {
    const converted = await convertRayFile(
      { input_path: inputPath, output_path: siblingWithExtension(inputPath, ".txt") },
      { observer },
    );
    if (!converted.ok) {
      console.error(`${converted.code}: ${converted.error}`);
      process.exit(1);
    }
    console.error(`converted ${inputPath} -> ${converted.output_path}`);
    inputPath = converted.output_path;
  }

  const result = await subsampleRayFile(
    {
      input_path: inputPath,
      target_rays: Number(args.target),
      output_path: ensureExtension(path.resolve(args.out), defaultExtensionFor(format)),
      output_format: format,
      method,
      seed: args.seed,
    },
    { observer },
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
