// src/field/render/renderTool.ts
import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";

import { fieldFormatFromPath, readFieldFile, type ReadFieldOptions } from "../fieldFile.js";
import type { FieldDims } from "../format.js";
import { existsPath, isDirectory, listFiles } from "../fsUtil.js";
import { FieldRenderer } from "./fieldRenderer.js";

export type RenderToolOptions = Readonly<{
  out?: string;
  cell?: number;
  showBacktrack?: boolean;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  includeJson?: boolean;
  fldDims?: FieldDims;
}>;

function defaultOutFile(inputFile: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.png`;
}

function defaultOutDirForDir(inputDir: string): string {
  return `${inputDir}__png`;
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

export async function runRenderTool(inputPath: string, opts: RenderToolOptions): Promise<void> {
  const renderer = new FieldRenderer({
    ...(opts.cell !== undefined ? { cell: opts.cell } : {}),
    showBacktrack: opts.showBacktrack === true,
  });
  const readOpts = (p: string): ReadFieldOptions => ({
    ...(opts.fldDims ? { fldDims: opts.fldDims } : {}),
    warn: (m) => console.warn(`${p}: ${m}`),
  });

  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const includeJson = opts.includeJson === true;

  const inIsDir = await isDirectory(inputPath);

  if (!inIsDir) {
    const outPath = opts.out ?? defaultOutFile(inputPath);

    if (!overwrite && (await existsPath(outPath))) {
      console.warn(`Skip (exists): ${outPath}`);
      return;
    }

    if (dryRun) {
      console.log(`[dry-run] ${inputPath} -> ${outPath}`);
      return;
    }

    const field = await readFieldFile(inputPath, readOpts(inputPath));
    const png = renderer.renderFieldToPng(field);
    await ensureParentDir(outPath);
    await writeFile(outPath, png);
    console.log(`${inputPath} -> ${outPath}`);
    return;
  }

  const outDir = opts.out ?? defaultOutDirForDir(inputPath);
  if (!dryRun) await mkdir(outDir, { recursive: true });

  const inDirAbs = path.resolve(inputPath);
  const outDirAbs = path.resolve(outDir);

  const files = await listFiles(inputPath, recursive);

  for (const f of files) {
    const fmt = fieldFormatFromPath(f);
    const isCandidate = fmt === "fld" || fmt === "fldx" || (includeJson && fmt === "json");
    if (!isCandidate) continue;

    // Avoid reprocessing output dir if nested
    if (path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = path.join(outDir, rel).replace(/\.(fldx?|json)$/i, ".png");

    if (!overwrite && (await existsPath(dest))) continue;

    if (dryRun) {
      console.log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    const field = await readFieldFile(f, readOpts(f));
    const png = renderer.renderFieldToPng(field);

    await ensureParentDir(dest);
    await writeFile(dest, png);
  }

  console.log(`Done. out=${outDir}`);
}
