#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { readFile, writeFile } from "node:fs/promises";

import { base64UrlToBytes, bytesToBase64Url } from "./field/base64.js";
import { renderFieldAscii } from "./field/display.js";
import { InvalidDocumentError } from "./field/errors.js";
import {
  decodeFieldBytes,
  readFieldFile,
  requireFieldFormat,
  writeFieldFile,
  type ReadFieldOptions,
} from "./field/fieldFile.js";
import { fieldToJsonV1, stringifyFieldJsonV1 } from "./field/fieldJsonV1.js";
import { runTransformTool } from "./field/transformTool.js";
import { runRenderTool } from "./field/render/renderTool.js";

type DimsOpts = { width: number; height: number };

function parseIntOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function readOptions(opts: DimsOpts, warnings: string[]): ReadFieldOptions {
  return {
    fldDims: { width: opts.width, height: opts.height },
    warn: (m) => warnings.push(m),
  };
}

function flushWarnings(warnings: string[]): void {
  for (const w of warnings) console.warn(w);
}

function withDims(cmd: Command): Command {
  return cmd
    .option("--width <n>", "Field width for .fld input (no size header)", parseIntOption, 15)
    .option("--height <n>", "Field height for .fld input (no size header)", parseIntOption, 15);
}

const program = new Command();

program
  .name("fieldtools")
  .description("Board field tools (.fld/.fldx <-> JSON, backtrack exits, transforms, renderer)")
  .version("0.1.0");

withDims(
  program
    .command("to-json")
    .description("Convert a .fld or .fldx file to JSON")
    .argument("<input>", "Path to .fld/.fldx file")
    .option("-o, --output <path>", "Write JSON to a file (default: stdout)"),
).action(async (input: string, opts: DimsOpts & { output?: string }) => {
  const warnings: string[] = [];
  const field = await readFieldFile(input, readOptions(opts, warnings));
  flushWarnings(warnings);

  const text = stringifyFieldJsonV1(fieldToJsonV1(field));
  if (opts.output) await writeFile(opts.output, text, "utf8");
  else process.stdout.write(text);
});

program
  .command("from-json")
  .description("Convert a JSON field back to .fld or .fldx (chosen by output extension)")
  .argument("<input>", "Path to JSON file")
  .requiredOption("-o, --output <path>", "Write .fld/.fldx to this path")
  .action(async (input: string, opts: { output: string }) => {
    if (requireFieldFormat(input) !== "json") {
      throw new InvalidDocumentError(`Expected a .json input: ${input}`);
    }
    const field = await readFieldFile(input);
    await writeFieldFile(opts.output, field);
  });

withDims(
  program
    .command("convert")
    .description("Convert between .fld, .fldx and .json (formats chosen by extension)")
    .argument("<input>", "Input field file")
    .requiredOption("-o, --output <path>", "Output field file")
    .option("--rebuild-backtrack", "Rebuild backtrack exits before writing", false),
).action(async (input: string, opts: DimsOpts & { output: string; rebuildBacktrack: boolean }) => {
  const warnings: string[] = [];
  const field = await readFieldFile(input, readOptions(opts, warnings));
  flushWarnings(warnings);

  if (opts.rebuildBacktrack) field.buildBacktrack();
  await writeFieldFile(opts.output, field);
  console.log(`${input} -> ${opts.output} (${field.width}x${field.height})`);
});

withDims(
  program
    .command("show")
    .description("Print a field as ASCII (debugging aid)")
    .argument("<input>", "Input field file"),
).action(async (input: string, opts: DimsOpts) => {
  const warnings: string[] = [];
  const field = await readFieldFile(input, readOptions(opts, warnings));
  flushWarnings(warnings);
  process.stdout.write(renderFieldAscii(field) + "\n");
});

withDims(
  program
    .command("backtrack")
    .description("Rebuild backtrack exits from normal exits and write the field back")
    .argument("<input>", "Input field file")
    .option("-o, --output <path>", "Output file (default: overwrite input)"),
).action(async (input: string, opts: DimsOpts & { output?: string }) => {
  const warnings: string[] = [];
  const field = await readFieldFile(input, readOptions(opts, warnings));
  flushWarnings(warnings);

  field.buildBacktrack();
  const out = opts.output ?? input;
  await writeFieldFile(out, field);
  console.log(`${input} -> ${out}`);
});

withDims(
  program
    .command("transform")
    .description(
      "Apply a geometric transform to a field or folder of fields. Default is to write copies; use --in-place to overwrite.",
    )
    .argument("op", "rot90|rot180|rot270|flip-h|flip-v|flip-nwse|flip-nesw")
    .argument("input", "Path to .fld/.fldx/.json OR a directory containing field files")
    .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
    .option("--in-place", "Overwrite inputs in place (use with care)", false)
    .option("--recursive", "Recurse into subdirectories (directory input)", false)
    .option("--include-json", "When input is a directory, include .json files too", false)
    .option("--overwrite", "Allow overwriting existing outputs (non in-place)", false)
    .option("--backup", "When --in-place, write a .bak copy before overwriting", false)
    .option("--dry-run", "Print planned operations but do not write anything", false),
).action(
  async (
    op: string,
    input: string,
    opts: DimsOpts & {
      out?: string;
      inPlace: boolean;
      recursive: boolean;
      includeJson: boolean;
      overwrite: boolean;
      backup: boolean;
      dryRun: boolean;
    },
  ) => {
    const { width, height, ...rest } = opts;
    await runTransformTool(op, input, { ...rest, fldDims: { width, height } });
  },
);

withDims(
  program
    .command("render")
    .description("Render a field or folder of fields to PNG previews")
    .argument("input", "Path to .fld/.fldx/.json OR directory")
    .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
    .option("--cell <px>", "Panel size in pixels", parseIntOption, 16)
    .option("--show-backtrack", "Also draw backtrack exits", false)
    .option("--recursive", "Recurse into subdirectories (directory input)", false)
    .option("--include-json", "When input is a directory, include .json files too", false)
    .option("--overwrite", "Overwrite existing PNGs", false)
    .option("--dry-run", "Print planned operations but do not write anything", false),
).action(
  async (
    input: string,
    opts: DimsOpts & {
      out?: string;
      cell: number;
      showBacktrack: boolean;
      recursive: boolean;
      includeJson: boolean;
      overwrite: boolean;
      dryRun: boolean;
    },
  ) => {
    const { width, height, ...rest } = opts;
    await runRenderTool(input, { ...rest, fldDims: { width, height } });
  },
);

program
  .command("base64")
  .description("Print a .fld or .fldx file as URL-safe base64")
  .argument("<input>", "Path to .fld/.fldx file")
  .action(async (input: string) => {
    const format = requireFieldFormat(input);
    if (format === "json") throw new InvalidDocumentError("base64 takes a .fld or .fldx file");
    const bytes = await readFile(input);
    process.stdout.write(bytesToBase64Url(bytes) + "\n");
  });

withDims(
  program
    .command("from-base64")
    .description("Decode URL-safe base64 field data and write it as a field file")
    .argument("<text>", "Base64 text")
    .option("--from <format>", "Format of the encoded data: fld|fldx", "fldx")
    .requiredOption("-o, --output <path>", "Output field file"),
).action(async (text: string, opts: DimsOpts & { from: string; output: string }) => {
  if (opts.from !== "fld" && opts.from !== "fldx") {
    throw new InvalidDocumentError(`Invalid --from '${opts.from}' (expected fld|fldx)`);
  }
  const warnings: string[] = [];
  const field = decodeFieldBytes(opts.from, base64UrlToBytes(text), readOptions(opts, warnings));
  flushWarnings(warnings);

  await writeFieldFile(opts.output, field);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
