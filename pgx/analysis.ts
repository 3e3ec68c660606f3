import type { Readable } from "node:stream";
import { config } from "./config.ts";
import { evaluateDrugRisks } from "./drugRisk.ts";
import type { DrugRuleTableInstance } from "./drugRules.ts";
import { createLoggedHooks, type PipelineHooksInstance } from "./hooks.ts";
import { interpretVariants } from "./interpretation.ts";
import type { PhenotypeRuleTableInstance } from "./phenotypeRules.ts";
import { buildReports, type DrugReport, type ReportDeps } from "./report.ts";
import type { DrugRiskResult, GeneProfile } from "./types.ts";
import { parseVcf, parseVcfStream, type VcfParseResult } from "./vcfParser.ts";

/** Rejected request input. The HTTP layer answers these with 400. */
export class AnalysisInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalysisInputError";
  }
}

export interface VcfUpload {
  name: string | null;
  content: Buffer;
}

const MIB = 1024 * 1024;

export function uploadLimitMessage(maxBytes: number): string {
  return `File exceeds ${Number((maxBytes / MIB).toFixed(2))} MB limit`;
}

export function validateUpload(upload: VcfUpload | null | undefined, maxBytes: number = config.MAX_VCF_BYTES): VcfUpload {
  if (!upload || upload.content.byteLength === 0) throw new AnalysisInputError("No file uploaded");
  if (!upload.name || !upload.name.endsWith(".vcf")) throw new AnalysisInputError("File must be a .vcf file");
  if (upload.content.byteLength > maxBytes) {
    throw new AnalysisInputError(uploadLimitMessage(maxBytes));
  }
  return upload;
}

export interface PipelineDeps {
  hooks?: PipelineHooksInstance;
  rules?: PhenotypeRuleTableInstance;
  table?: DrugRuleTableInstance;
}

export interface PipelineResult {
  parse: VcfParseResult;
  profiles: GeneProfile[];
  drugRisks: DrugRiskResult[];
}

/** Interpretation and drug evaluation over an existing parse. */
export function interpretParse(parse: VcfParseResult, drugs: string | null | undefined, deps: PipelineDeps = {}): PipelineResult {
  const hooks = deps.hooks ?? createLoggedHooks();
  hooks.emit("vcf:parsed", {
    variantCount: parse.variants.length,
    errorCount: parse.errors.length,
    metadata: { ...parse.metadata },
  });
  const profiles = interpretVariants(parse.variants, { rules: deps.rules, hooks });
  const drugRisks = evaluateDrugRisks(profiles, drugs, { table: deps.table, hooks });
  return { parse, profiles, drugRisks };
}

/** The deterministic core: parse → interpret → evaluate, synchronously. */
export function runPipeline(content: string | Buffer, drugs: string | null | undefined, deps: PipelineDeps = {}): PipelineResult {
  return interpretParse(parseVcf(content), drugs, deps);
}

export interface AnalyseDeps extends PipelineDeps, ReportDeps {
  maxBytes?: number;
}

function reportsFor(result: PipelineResult, deps: AnalyseDeps): Promise<DrugReport[]> {
  return buildReports(
    {
      drugRisks: result.drugRisks,
      profiles: result.profiles,
      variants: result.parse.variants,
      parseSuccess: result.parse.success,
    },
    deps,
  );
}

/** Validate → pipeline → reports. */
export async function analyse(upload: VcfUpload | null | undefined, drugs: string | null | undefined, deps: AnalyseDeps = {}) {
  const valid = validateUpload(upload, deps.maxBytes);
  return reportsFor(runPipeline(valid.content, drugs, deps), deps);
}

/** {@link analyse} over a byte stream, without upload validation. */
export async function analyseStream(input: Readable, drugs: string | null | undefined, deps: AnalyseDeps = {}) {
  const parse = await parseVcfStream(input);
  return reportsFor(interpretParse(parse, drugs, deps), deps);
}

/** Validated raw parse, for inspecting annotations. */
export function parseUpload(upload: VcfUpload | null | undefined, maxBytes?: number): VcfParseResult {
  return parseVcf(validateUpload(upload, maxBytes).content);
}
