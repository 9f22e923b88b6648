// src/field/transformTool.ts
import path from "node:path";
import { copyFile, mkdir } from "node:fs/promises";

import { fieldFormatFromPath, readFieldFile, writeFieldFile, type FieldFormat } from "./fieldFile.js";
import { parseTransformKind, transformField } from "./fieldTransform.js";
import type { FieldDims } from "./format.js";
import { existsPath, isDirectory, listFiles } from "./fsUtil.js";

export type TransformToolOptions = Readonly<{
  out?: string;
  inPlace?: boolean;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  includeJson?: boolean;
  backup?: boolean; // only meaningful with inPlace
  fldDims?: FieldDims;
}>;

export type TransformSummary = Readonly<{
  processed: number;
  written: number;
  skipped: number;
}>;

function defaultOutFileForFile(inputFile: string, op: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  const suffix = op.toLowerCase().replace(/[^a-z0-9]+/g, "-");
  return `${base}.${suffix}${ext}`;
}

function defaultOutDirForDir(inputDir: string, op: string): string {
  const suffix = op.toLowerCase().replace(/[^a-z0-9]+/g, "-");
  return `${inputDir}__${suffix}`;
}

function inferFormatForDirFile(filePath: string, includeJson: boolean): FieldFormat | null {
  const fmt = fieldFormatFromPath(filePath);
  if (fmt === "json" && !includeJson) return null;
  return fmt;
}

async function transformOne(
  inputPath: string,
  outPath: string,
  opRaw: string,
  opts: TransformToolOptions,
): Promise<void> {
  const op = parseTransformKind(opRaw);
  const field = await readFieldFile(inputPath, {
    ...(opts.fldDims ? { fldDims: opts.fldDims } : {}),
    warn: (m) => console.warn(`${inputPath}: ${m}`),
  });
  const outField = transformField(field, op);

  if (
    fieldFormatFromPath(outPath) === "fld" &&
    (outField.width !== field.width || outField.height !== field.height)
  ) {
    console.warn(
      `${outPath}: .fld stores no dimensions; read it back as ${outField.width}x${outField.height}`,
    );
  }

  await writeFieldFile(outPath, outField);
}

export async function runTransformTool(
  opRaw: string,
  inputPath: string,
  opts: TransformToolOptions,
): Promise<TransformSummary> {
  // fail on a bad op before touching any file
  parseTransformKind(opRaw);

  const inIsDir = await isDirectory(inputPath);

  // Normalize options
  const inPlace = opts.inPlace === true;
  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const includeJson = opts.includeJson === true;
  const backup = opts.backup === true;

  let processed = 0;
  let written = 0;
  let skipped = 0;

  if (!inIsDir) {
    let outPath: string;
    if (inPlace) {
      outPath = inputPath;
    } else if (opts.out) {
      const outIsDir = !path.extname(opts.out);
      outPath = outIsDir ? path.join(opts.out, path.basename(inputPath)) : opts.out;
    } else {
      outPath = defaultOutFileForFile(inputPath, opRaw);
    }

    if (!inPlace && !overwrite && (await existsPath(outPath))) {
      console.warn(`Skip (exists): ${outPath}`);
      return { processed: 1, written: 0, skipped: 1 };
    }

    processed++;

    if (dryRun) {
      console.log(`[dry-run] ${inputPath} -> ${outPath}`);
      return { processed, written: 0, skipped: 0 };
    }

    if (inPlace && backup) {
      const bak = `${inputPath}.bak`;
      if (!overwrite && (await existsPath(bak))) {
        throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
      }
      await copyFile(inputPath, bak);
    }

    await transformOne(inputPath, outPath, opRaw, opts);
    written++;

    console.log(`${inputPath} -> ${outPath}`);
    return { processed, written, skipped };
  }

  // Directory mode
  const outDir = inPlace ? null : (opts.out ?? defaultOutDirForDir(inputPath, opRaw));
  const outDirAbs = outDir ? path.resolve(outDir) : null;
  const inDirAbs = path.resolve(inputPath);

  if (outDir && !dryRun) await mkdir(outDir, { recursive: true });

  const allFiles = await listFiles(inputPath, recursive);

  for (const f of allFiles) {
    const fmt = inferFormatForDirFile(f, includeJson);
    if (!fmt) continue;

    // If output dir is inside input dir (user chose so), avoid reprocessing output files.
    if (outDirAbs && path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    processed++;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = outDir ? path.join(outDir, rel) : f;

    if (!inPlace && !overwrite && (await existsPath(dest))) {
      skipped++;
      continue;
    }

    if (dryRun) {
      console.log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    if (inPlace && backup) {
      const bak = `${f}.bak`;
      if (!overwrite && (await existsPath(bak))) {
        throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
      }
      await copyFile(f, bak);
    }

    await transformOne(f, dest, opRaw, opts);
    written++;
  }

  console.log(
    `Done. processed=${processed} written=${written} skipped=${skipped}` +
      (outDir ? ` out=${outDir}` : " (in-place)"),
  );

  return { processed, written, skipped };
}
