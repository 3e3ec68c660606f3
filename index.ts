/**
 * genorisk: deterministic pharmacogenomic risk classification.
 *
 * VCF text → variant records → per-gene diplotypes → phenotypes → per-drug
 * risk label, severity and confidence. The core is synchronous and holds no
 * state between calls; reports, narratives and transport sit around it.
 */

// Core pipeline
export { createVariantRecord, classifyGenotype, isHeterozygous, isHomozygousAlt } from "./pgx/variant.ts";
export type { VariantRecord, VariantInit, Zygosity } from "./pgx/variant.ts";
export { parseVcf, parseVcfStream, parseInfoField, extractGenotype } from "./pgx/vcfParser.ts";
export type { VcfParseResult } from "./pgx/vcfParser.ts";
export { filterActionable, groupByGene } from "./pgx/grouping.ts";
export { resolveDiplotype, normalizeStarAllele } from "./pgx/diplotypeResolver.ts";
export type { Resolution } from "./pgx/diplotypeResolver.ts";
export {
    PhenotypeRuleTable,
    phenotypeRules,
    lookupPhenotype,
    loadPhenotypeRules,
    createPhenotypeRuleTable,
} from "./pgx/phenotypeRules.ts";
export type { PhenotypeRuleTableInstance, PhenotypeRuleData } from "./pgx/phenotypeRules.ts";
export { interpretVariants } from "./pgx/interpretation.ts";
export type { InterpretationDeps } from "./pgx/interpretation.ts";
export { DrugRuleTable, drugRules, createDrugRuleTable } from "./pgx/drugRules.ts";
export type { DrugRuleTableInstance } from "./pgx/drugRules.ts";
export { evaluateDrugRisks, parseDrugList, FALLBACK_PHENOTYPE } from "./pgx/drugRisk.ts";
export { assessRisk, resolveConfidence, resolveSeverity, CONFIDENCE, CRITICAL_PAIRS } from "./pgx/riskAssessment.ts";
export type { AssessmentBasis, AssessmentInput } from "./pgx/riskAssessment.ts";
export { REQUIRED_PANEL, REFERENCE_ALLELE, UNKNOWN_PHENOTYPE, isPanelGene } from "./pgx/panel.ts";
export type { PanelGene } from "./pgx/panel.ts";
export { RISK_LABELS, SEVERITIES, makeGeneProfile } from "./pgx/types.ts";
export type { GeneProfile, DrugRiskResult, RiskAssessment, RiskLabel, Severity } from "./pgx/types.ts";

// Hooks
export { PipelineHooks, createPipelineHooks, createLoggedHooks, attachLogging } from "./pgx/hooks.ts";
export type {
    PipelineEvent,
    PipelineEventMap,
    PipelineEventType,
    PipelineHooksInstance,
    HookListener,
    Unsubscribe,
} from "./pgx/hooks.ts";

// Reports and surfaces
export { recommend, recommendations, loadRecommendations } from "./pgx/recommendations.ts";
export type { ClinicalRecommendation, RecommendationTable } from "./pgx/recommendations.ts";
export {
    createOpenAINarrator,
    createDefaultNarrator,
    createOpenAIClient,
    placeholderNarrator,
    buildNarrativePrompt,
    PLACEHOLDER_SUMMARY,
} from "./pgx/narrative.ts";
export type { NarrativeFacts, NarrativeGenerator, ChatCompletionsClient } from "./pgx/narrative.ts";
export { buildReports, toShortPhenotype } from "./pgx/report.ts";
export type { DrugReport, ShortPhenotype } from "./pgx/report.ts";
export {
    AnalysisInputError,
    validateUpload,
    runPipeline,
    interpretParse,
    analyse,
    analyseStream,
    parseUpload,
} from "./pgx/analysis.ts";
export type { VcfUpload, PipelineResult, AnalyseDeps } from "./pgx/analysis.ts";
export { createApp } from "./pgx/server.ts";
export type { ServerDeps } from "./pgx/server.ts";
export { createLogger, rootLogger } from "./pgx/logger.ts";
export type { Logger, LogLevel } from "./pgx/logger.ts";
export { config } from "./pgx/config.ts";
