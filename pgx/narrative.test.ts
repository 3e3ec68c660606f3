import { describe, it, expect, vi } from "vitest";
import {
  NARRATIVE_SYSTEM_PROMPT,
  PLACEHOLDER_SUMMARY,
  buildNarrativePrompt,
  createDefaultNarrator,
  createOpenAIClient,
  createOpenAINarrator,
  placeholderNarrator,
  type NarrativeFacts,
  type NarrativeSettings,
} from "./narrative.ts";
import type { Logger } from "./logger.ts";

const facts: NarrativeFacts = {
  drug: "CODEINE",
  gene: "CYP2D6",
  diplotype: "*4/*4",
  phenotype: "PM – Poor Metabolizer",
  riskLabel: "Ineffective",
  severity: "moderate",
  action: "Avoid codeine — use alternative analgesic",
};

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function fakeClient(create: ReturnType<typeof vi.fn>) {
  return { chat: { completions: { create } } };
}

describe("buildNarrativePrompt", () => {
  it("lists every fact on its own line", () => {
    const prompt = buildNarrativePrompt(facts);
    expect(prompt.split("\n").slice(0, 7)).toEqual([
      "Drug: CODEINE",
      "Governing gene: CYP2D6",
      "Patient diplotype: *4/*4",
      "Phenotype: PM – Poor Metabolizer",
      "Risk label: Ineffective",
      "Severity: moderate",
      "Advised clinical action: Avoid codeine — use alternative analgesic",
    ]);
  });

  it("writes Unknown for missing values", () => {
    const prompt = buildNarrativePrompt({ ...facts, gene: null, diplotype: " ", phenotype: null });
    expect(prompt).toContain("Governing gene: Unknown\nPatient diplotype: Unknown\nPhenotype: Unknown\n");
  });
});

describe("createOpenAINarrator", () => {
  it("returns the trimmed completion", async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: "  Codeine will not work.  " } }] });
    const narrator = createOpenAINarrator({ client: fakeClient(create), model: "test-model", log: fakeLogger() });

    await expect(narrator.summarize(facts)).resolves.toBe("Codeine will not work.");
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: NARRATIVE_SYSTEM_PROMPT },
        { role: "user", content: buildNarrativePrompt(facts) },
      ],
    });
  });

  it("falls back on empty output", async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: "   " } }] });
    const narrator = createOpenAINarrator({ client: fakeClient(create), log: fakeLogger() });
    await expect(narrator.summarize(facts)).resolves.toBe(PLACEHOLDER_SUMMARY);
  });

  it("falls back when no choice is returned", async () => {
    const create = vi.fn().mockResolvedValue({ choices: [] });
    const narrator = createOpenAINarrator({ client: fakeClient(create), log: fakeLogger() });
    await expect(narrator.summarize(facts)).resolves.toBe(PLACEHOLDER_SUMMARY);
  });

  it("falls back and warns when the call fails", async () => {
    const log = fakeLogger();
    const create = vi.fn().mockRejectedValue(new Error("rate limited"));
    const narrator = createOpenAINarrator({ client: fakeClient(create), log });
    await expect(narrator.summarize(facts)).resolves.toBe(PLACEHOLDER_SUMMARY);
    expect(log.warn).toHaveBeenCalledWith("summary failed for CODEINE: rate limited");
  });
});

const settings: NarrativeSettings = {
  NARRATIVE_ENABLED: true,
  NARRATIVE_MODEL: "gpt-4o-mini",
  OPENAI_API_KEY: "test-secret",
  NARRATIVE_TIMEOUT_MS: 2_500,
  NARRATIVE_MAX_RETRIES: 0,
};

describe("createOpenAIClient", () => {
  it("bounds request time and retries", () => {
    const client = createOpenAIClient(settings);
    expect(client.timeout).toBe(2_500);
    expect(client.maxRetries).toBe(0);
  });
});

describe("createDefaultNarrator", () => {
  it("uses the placeholder without an API key", () => {
    expect(createDefaultNarrator({ ...settings, OPENAI_API_KEY: "" })).toBe(placeholderNarrator);
  });

  it("uses the placeholder when disabled", () => {
    expect(createDefaultNarrator({ ...settings, NARRATIVE_ENABLED: false })).toBe(placeholderNarrator);
  });

  it("builds an OpenAI narrator when keyed", () => {
    expect(createDefaultNarrator(settings)).not.toBe(placeholderNarrator);
  });

  it("returns the placeholder text", async () => {
    await expect(placeholderNarrator.summarize(facts)).resolves.toBe(PLACEHOLDER_SUMMARY);
  });
});
