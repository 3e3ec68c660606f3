import OpenAI from "openai";
import { config } from "./config.ts";
import { createLogger, type Logger } from "./logger.ts";

/**
 * Plain-language summaries of an already computed result.
 *
 * The model only narrates: it receives the finished facts and its output is
 * never read back into them. Every failure yields the placeholder text.
 */

export interface NarrativeFacts {
  readonly drug: string;
  readonly gene: string | null;
  readonly diplotype: string | null;
  readonly phenotype: string | null;
  readonly riskLabel: string;
  readonly severity: string;
  readonly action: string;
}

export interface NarrativeGenerator {
  summarize(facts: NarrativeFacts): Promise<string>;
}

/** The slice of the OpenAI client the narrator calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: [{ role: "system"; content: string }, { role: "user"; content: string }];
      }): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
}

export const PLACEHOLDER_SUMMARY =
  "Explanation unavailable — pharmacogenomic profile and risk assessment are provided in the structured fields above.";

export const NARRATIVE_SYSTEM_PROMPT =
  "You are a clinical pharmacogenomics assistant. " +
  "Write a single concise paragraph of 3-4 sentences that explains in plain English why this patient's " +
  "genetic profile affects the named drug and what the clinical consequence of the stated risk label is. " +
  "Use only the facts given to you. Do not suggest a different risk level, severity, or treatment action. " +
  "Do not use bullet points or disclaimers.";

const orUnknown = (value: string | null) => (value !== null && value.trim() !== "" ? value : "Unknown");

export function buildNarrativePrompt(facts: NarrativeFacts): string {
  return [
    `Drug: ${facts.drug}`,
    `Governing gene: ${orUnknown(facts.gene)}`,
    `Patient diplotype: ${orUnknown(facts.diplotype)}`,
    `Phenotype: ${orUnknown(facts.phenotype)}`,
    `Risk label: ${orUnknown(facts.riskLabel)}`,
    `Severity: ${orUnknown(facts.severity)}`,
    `Advised clinical action: ${orUnknown(facts.action)}`,
    "",
    "Summarise why this genetic profile affects this drug and what the clinical consequence of the risk label is.",
  ].join("\n");
}

export const placeholderNarrator: NarrativeGenerator = {
  summarize: async () => PLACEHOLDER_SUMMARY,
};

export interface OpenAINarratorOptions {
  client: ChatCompletionsClient;
  model?: string;
  log?: Logger;
}

export function createOpenAINarrator(options: OpenAINarratorOptions): NarrativeGenerator {
  const { client, model = config.NARRATIVE_MODEL, log = createLogger("narrative") } = options;

  return {
    async summarize(facts) {
      try {
        const completion = await client.chat.completions.create({
          model,
          messages: [
            { role: "system", content: NARRATIVE_SYSTEM_PROMPT },
            { role: "user", content: buildNarrativePrompt(facts) },
          ],
        });
        const text = completion.choices[0]?.message?.content?.trim();
        return text ? text : PLACEHOLDER_SUMMARY;
      } catch (err) {
        log.warn(`summary failed for ${facts.drug}: ${err instanceof Error ? err.message : String(err)}`);
        return PLACEHOLDER_SUMMARY;
      }
    },
  };
}

export type NarrativeSettings = Pick<
  typeof config,
  "NARRATIVE_ENABLED" | "NARRATIVE_MODEL" | "OPENAI_API_KEY" | "NARRATIVE_TIMEOUT_MS" | "NARRATIVE_MAX_RETRIES"
>;

export function createOpenAIClient(settings: NarrativeSettings = config): OpenAI {
  return new OpenAI({
    apiKey: settings.OPENAI_API_KEY,
    timeout: settings.NARRATIVE_TIMEOUT_MS,
    maxRetries: settings.NARRATIVE_MAX_RETRIES,
  });
}

/** OpenAI-backed narrator when enabled and keyed, otherwise the placeholder. */
export function createDefaultNarrator(settings: NarrativeSettings = config): NarrativeGenerator {
  if (!settings.NARRATIVE_ENABLED || settings.OPENAI_API_KEY === "") return placeholderNarrator;
  return createOpenAINarrator({
    client: createOpenAIClient(settings),
    model: settings.NARRATIVE_MODEL,
  });
}
