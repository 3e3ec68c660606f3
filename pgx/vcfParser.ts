import type { Readable } from "node:stream";
import { parse as parseCsvStream, type Options } from "csv-parse";
import { parse as parseCsvSync } from "csv-parse/sync";
import { isPanelGene } from "./panel.ts";
import { createVariantRecord, type VariantRecord } from "./variant.ts";

export interface VcfParseResult {
  /** Records annotated with a panel gene, in file order. */
  variants: VariantRecord[];
  /** Captured `##fileformat` / `##reference` values. */
  metadata: Record<string, string>;
  /** Non-fatal diagnostics, one per skipped line. */
  errors: string[];
  success: boolean;
}

const MIN_COLUMNS = 8;
const PREVIEW_CHARS = 50;
const CAPTURED_META_KEYS: ReadonlySet<string> = new Set(["fileformat", "reference"]);

// VCF is plain TAB-separated text: no quoting, ragged rows allowed.
const csvOptions: Options = {
  delimiter: "\t",
  quote: null,
  relax_column_count: true,
  // Keep empty lines so line numbers in diagnostics match the file.
  skip_empty_lines: false,
  bom: true,
};

const COLUMN_NAMES = ["CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO", "FORMAT"] as const;
type ColumnName = (typeof COLUMN_NAMES)[number];

const STANDARD_LAYOUT: Record<ColumnName, number> = {
  CHROM: 0,
  POS: 1,
  ID: 2,
  REF: 3,
  ALT: 4,
  QUAL: 5,
  FILTER: 6,
  INFO: 7,
  FORMAT: 8,
};

/** Column positions from a `#CHROM` header; names the header lacks keep their standard slot. */
function layoutFromHeader(fields: string[]): Record<ColumnName, number> {
  const names = fields.map((f, i) => (i === 0 ? f.replace(/^#/, "") : f).trim().toUpperCase());
  const layout = { ...STANDARD_LAYOUT };
  for (const key of COLUMN_NAMES) {
    const idx = names.indexOf(key);
    if (idx !== -1) layout[key] = idx;
  }
  return layout;
}

export function parseInfoField(info: string | undefined): Record<string, string> {
  const map: Record<string, string> = {};
  if (info === undefined || info === "" || info === ".") return map;
  for (const token of info.split(";")) {
    if (token === "") continue;
    const eq = token.indexOf("=");
    if (eq === -1) map[token] = "true";
    else map[token.slice(0, eq)] = token.slice(eq + 1);
  }
  return map;
}

/** Reads the sample value at the `GT` offset of the FORMAT column. */
export function extractGenotype(format: string | undefined, sample: string | undefined): string | null {
  if (format === undefined || sample === undefined) return null;
  const keys = format.split(":");
  const values = sample.split(":");
  const idx = keys.indexOf("GT");
  if (idx === -1 || idx >= values.length) return null;
  return values[idx] ?? null;
}

function parsePosition(raw: string | undefined): number | null {
  if (raw === undefined || !/^[+-]?\d+$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Line-by-line VCF state machine shared by the sync and streaming entry points.
 */
function createVcfAccumulator() {
  const variants: VariantRecord[] = [];
  const metadata: Record<string, string> = {};
  const errors: string[] = [];
  let layout = STANDARD_LAYOUT;
  let lineNo = 0;

  function meta(line: string) {
    const eq = line.indexOf("=");
    if (eq === -1) return;
    const key = line.slice(2, eq);
    if (CAPTURED_META_KEYS.has(key)) metadata[key] = line.slice(eq + 1);
  }

  function data(fields: string[], line: string) {
    const preview = line.slice(0, PREVIEW_CHARS);
    if (fields.length < MIN_COLUMNS) {
      errors.push(`Line ${lineNo}: malformed line (too few columns): ${preview}`);
      return;
    }

    const position = parsePosition(fields[layout.POS]);
    if (position === null) {
      errors.push(`Line ${lineNo}: could not parse position: ${preview}`);
      return;
    }

    const id = fields[layout.ID] ?? ".";
    const info = parseInfoField(fields[layout.INFO]);
    const gene = info.GENE ?? "";
    const rsid = id.startsWith("rs") ? id : info.RS ?? id;

    if (!isPanelGene(gene)) return;

    variants.push(
      createVariantRecord({
        chrom: fields[layout.CHROM] ?? "",
        position,
        rsid,
        ref: fields[layout.REF] ?? "",
        alt: fields[layout.ALT] ?? "",
        filter: fields[layout.FILTER] ?? "",
        gene,
        starAllele: info.STAR ?? "",
        genotype: extractGenotype(fields[layout.FORMAT], fields[layout.FORMAT + 1]),
        info,
      }),
    );
  }

  return {
    accept(row: unknown) {
      lineNo += 1;
      const fields = toFields(row);
      if (fields === null) {
        throw new Error(`Unexpected tokenizer output at line ${lineNo}`);
      }
      const line = fields.join("\t");
      if (line.trim() === "") return;
      if (line.startsWith("##")) meta(line);
      else if (line.startsWith("#CHROM")) layout = layoutFromHeader(fields);
      else data(fields, line);
    },

    result(): VcfParseResult {
      return { variants, metadata, errors, success: errors.length === 0 };
    },
  };
}

function toFields(row: unknown): string[] | null {
  if (!Array.isArray(row)) return null;
  const fields: string[] = [];
  for (const f of row) {
    if (typeof f !== "string") return null;
    fields.push(f);
  }
  return fields;
}

/**
 * Parses an in-memory VCF document. Malformed data lines are reported in
 * `errors` and skipped; this never throws on content.
 */
export function parseVcf(content: string | Buffer): VcfParseResult {
  const acc = createVcfAccumulator();
  const rows: unknown = parseCsvSync(content, csvOptions);
  if (!Array.isArray(rows)) throw new Error("Unexpected tokenizer output");
  for (const row of rows) acc.accept(row);
  return acc.result();
}

/**
 * Parses a VCF byte stream. Content problems behave as in {@link parseVcf};
 * a failing source stream rejects with the stream's error.
 */
export async function parseVcfStream(input: Readable): Promise<VcfParseResult> {
  const acc = createVcfAccumulator();
  const parser = parseCsvStream(csvOptions);
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);
  for await (const row of parser) {
    acc.accept(row);
  }
  return acc.result();
}
