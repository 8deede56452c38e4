// src/utils/fileio.ts
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parseStructuralModel } from "../engine/export";
import type { StructuralModel } from "../engine/schema";

export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function importJson(path: string): Promise<StructuralModel> {
  return parseStructuralModel(await readJsonFile(path));
}

async function writeText(path: string, text: string) {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, "utf8");
}

export async function exportJson(model: StructuralModel, path: string) {
  await writeText(path, JSON.stringify(model, null, 2));
}

const csvCell = (cell: string) => /[",\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;

export function toCsv(rows: string[][]): string {
  return rows.map(r => r.map(csvCell).join(",")).join("\n");
}

export async function exportCsv(path: string, rows: string[][]) {
  await writeText(path, toCsv(rows));
}
