#!/usr/bin/env node
/**
 * Extraction CLI
 *
 * Runs every PDF in a folder through the pipeline.
 *
 * Usage:
 *   npm run extract -- --input <dir> --output <dir> [options]
 *   npm run extract -- <input-dir> <output-dir> [options]
 */

import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config";
import { createRunner, listPdfs, runDocuments } from "../pipeline/runner";
import { createConsoleProgress } from "./progress";
import { flagsToConfigOverrides, parseFlags } from "./flags";

const USAGE = `Usage: npm run extract -- --input <dir> --output <dir> [options]
       npm run extract -- <input-dir> <output-dir> [options]

Options:
  --config <path>          Config file (default: ./config.yaml)
  --provider <name>        openai | anthropic | google
  --model <id>             Layout detection model, default for text extraction
  --text-model <id>        Text extraction model
  --dpi <n>                Page render resolution
  --min-conf <x>           Minimum confidence for figures and tables
  --pages-per-call <n>     Pages per text extraction call
  --max-pages <n>          Only use the first N pages for text extraction
  --max-pdfs <n>           Only process the first N PDFs
  --no-page-images         Do not keep rendered page images
  --skip-cache             Skip LLM cache`;

async function main(): Promise<number> {
  const flags = parseFlags(process.argv.slice(2));

  if (flags.help) {
    console.log(USAGE);
    return 0;
  }

  const input = flags.input ?? flags.positional[0];
  const output = flags.output ?? flags.positional[1];
  if (!input || !output || flags.positional.length > 2) {
    console.error(USAGE);
    return 1;
  }

  const inputDir = path.resolve(input);
  if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
    console.error(`Input folder not found: ${inputDir}`);
    return 1;
  }

  const config = loadConfig(flags.config, flagsToConfigOverrides(flags));

  const pdfPaths = await listPdfs(inputDir, config.max_pdfs);
  if (pdfPaths.length === 0) {
    console.error(`No PDFs found in ${inputDir}`);
    return 1;
  }

  const runner = createRunner({
    config,
    outputRoot: output,
    progress: createConsoleProgress(),
    skipCache: flags.skipCache,
  });

  const { manifest, manifestFile } = await runDocuments(pdfPaths, runner);

  const t = manifest.totals;
  console.log(
    `\n${t.documents} documents: ${t.complete} complete, ${t.partial} partial, ${t.failed} failed`
  );
  console.log(
    `${t.sections} sections, ${t.figures} figures, ${t.tables} tables`
  );
  console.log(`Output: ${runner.storage.outputRoot}`);
  console.log(`Run manifest: ${manifestFile}`);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("\nExtraction failed:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
);
