import * as path from "node:path";

/**
 * Splits a file name into stem and extension. Only the last dot counts, and a
 * leading dot belongs to the stem (`.bashrc` has no extension).
 */
export function splitName(name: string): { stem: string; ext: string } {
  const ext = path.extname(name);
  return { stem: name.slice(0, name.length - ext.length), ext };
}

/** `report.pdf`, 2 → `report (2).pdf` */
export function suffixedName(name: string, n: number): string {
  const { stem, ext } = splitName(name);
  return `${stem} (${n})${ext}`;
}

/**
 * Candidate names for storing `name`, in order: the name itself, then
 * `stem (1).ext`, `stem (2).ext`, ... without end.
 */
export function* candidateNames(name: string): Generator<string> {
  yield name;
  for (let n = 1; ; n++) {
    yield suffixedName(name, n);
  }
}

/** Case-insensitive ascending, ties broken by the exact name. */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
