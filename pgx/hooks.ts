import { types, type Instance } from "mobx-state-tree";
import { createLogger, type Logger } from "./logger.ts";

/**
 * Pipeline hooks.
 *
 * The deterministic stages never log on their own. Anything an operator
 * should see (truncated diplotypes, backfilled genes, per-drug outcomes) is
 * emitted here, and the caller decides where it goes. One registry is
 * created per analysis run.
 */

/** ---------- Event Types ---------- */

export interface PipelineEventBase {
  type: string;
  timestamp: string;
}

export interface VcfParsedEvent extends PipelineEventBase {
  type: "vcf:parsed";
  variantCount: number;
  errorCount: number;
  metadata: Record<string, string>;
}

export interface HardLimitExceededEvent extends PipelineEventBase {
  type: "diplotype:hardLimitExceeded";
  gene: string;
  observedAlleles: string[];
  allele1: string;
  allele2: string;
}

export interface GeneBackfilledEvent extends PipelineEventBase {
  type: "gene:backfilled";
  gene: string;
  phenotype: string;
}

export interface DrugEvaluatedEvent extends PipelineEventBase {
  type: "drug:evaluated";
  drug: string;
  gene: string | null;
  riskLabel: string;
  severity: string;
  confidenceScore: number;
}

export type PipelineEvent = VcfParsedEvent | HardLimitExceededEvent | GeneBackfilledEvent | DrugEvaluatedEvent;

export type PipelineEventType = PipelineEvent["type"];

export interface PipelineEventMap {
  "vcf:parsed": VcfParsedEvent;
  "diplotype:hardLimitExceeded": HardLimitExceededEvent;
  "gene:backfilled": GeneBackfilledEvent;
  "drug:evaluated": DrugEvaluatedEvent;
}

/** Event payload without the envelope fields, as passed to `emit`. */
export type EventPayload<K extends PipelineEventType> = Omit<PipelineEventMap[K], "type" | "timestamp">;

export type HookListener<T extends PipelineEvent = PipelineEvent> = (event: T) => void;

export type Unsubscribe = () => void;

type AnyListener = (event: PipelineEvent) => void;

const hookLog = createLogger("hooks");

/** ---------- Registry ---------- */

export const PipelineHooks = types
  .model("PipelineHooks", {})
  .volatile(() => ({
    listeners: new Map<PipelineEventType, Set<AnyListener>>(),
    wildcardListeners: new Set<AnyListener>(),
  }))
  .views((self) => ({
    get listenerCount(): number {
      let count = self.wildcardListeners.size;
      for (const set of self.listeners.values()) {
        count += set.size;
      }
      return count;
    },
  }))
  .actions((self) => {
    function on<K extends PipelineEventType>(eventType: K, listener: HookListener<PipelineEventMap[K]>): Unsubscribe {
      // Dispatch is keyed by event type, so the listener only ever sees its own event shape.
      const typed: AnyListener = (event) => {
        if (event.type === eventType) listener(event as PipelineEventMap[K]);
      };
      let set = self.listeners.get(eventType);
      if (!set) {
        set = new Set();
        self.listeners.set(eventType, set);
      }
      set.add(typed);

      return () => {
        const current = self.listeners.get(eventType);
        if (current) {
          current.delete(typed);
          if (current.size === 0) self.listeners.delete(eventType);
        }
      };
    }

    function deliver(listener: AnyListener, event: PipelineEvent) {
      try {
        listener(event);
      } catch (e) {
        hookLog.error(`listener for ${event.type} threw: ${e instanceof Error ? e.message : String(e)}`);
      }
    }

    return {
      on,

      onAny(listener: HookListener): Unsubscribe {
        self.wildcardListeners.add(listener);
        return () => {
          self.wildcardListeners.delete(listener);
        };
      },

      once<K extends PipelineEventType>(eventType: K, listener: HookListener<PipelineEventMap[K]>): Unsubscribe {
        const unsub = on(eventType, (event) => {
          unsub();
          listener(event);
        });
        return unsub;
      },

      off(eventType: PipelineEventType): void {
        self.listeners.delete(eventType);
      },

      offAll(): void {
        self.listeners.clear();
        self.wildcardListeners.clear();
      },

      emit<K extends PipelineEventType>(eventType: K, payload: EventPayload<K>): void {
        const event = { ...payload, type: eventType, timestamp: new Date().toISOString() } as PipelineEventMap[K];
        for (const listener of [...(self.listeners.get(eventType) ?? [])]) deliver(listener, event);
        for (const listener of [...self.wildcardListeners]) deliver(listener, event);
      },
    };
  });

export type PipelineHooksInstance = Instance<typeof PipelineHooks>;

export function createPipelineHooks(): PipelineHooksInstance {
  return PipelineHooks.create({});
}

/**
 * Routes pipeline events to a logger: truncations as warnings, the rest at debug.
 */
export function attachLogging(hooks: PipelineHooksInstance, log: Logger = createLogger("pipeline")): Unsubscribe {
  const subs = [
    hooks.on("diplotype:hardLimitExceeded", (e) => {
      log.warn(`more than two heterozygous alleles for ${e.gene}; using ${e.allele1}/${e.allele2}. Check VCF annotation quality.`, {
        observed: e.observedAlleles.join(","),
      });
    }),
    hooks.on("vcf:parsed", (e) => {
      log.debug("vcf parsed", { variants: e.variantCount, errors: e.errorCount, fileformat: e.metadata.fileformat });
    }),
    hooks.on("gene:backfilled", (e) => {
      log.debug(`no actionable variants for ${e.gene}; assumed *1/*1`, { phenotype: e.phenotype });
    }),
    hooks.on("drug:evaluated", (e) => {
      log.debug(`${e.drug}: ${e.riskLabel}`, { gene: e.gene, severity: e.severity, confidence: e.confidenceScore });
    }),
  ];
  return () => subs.forEach((unsub) => unsub());
}

/** Fresh hooks with logging attached; the default for every pipeline entry point. */
export function createLoggedHooks(log?: Logger): PipelineHooksInstance {
  const hooks = createPipelineHooks();
  attachLogging(hooks, log);
  return hooks;
}
