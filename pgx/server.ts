import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { AnalysisInputError, analyse, parseUpload, uploadLimitMessage, type AnalyseDeps, type VcfUpload } from "./analysis.ts";
import { config } from "./config.ts";
import { drugRules } from "./drugRules.ts";
import { createLoggedHooks, type PipelineHooksInstance } from "./hooks.ts";
import { createLogger, type Logger } from "./logger.ts";
import { REQUIRED_PANEL } from "./panel.ts";

export interface ServerDeps extends Omit<AnalyseDeps, "hooks"> {
  /** Called once per request; runs never share a registry. */
  createHooks?: () => PipelineHooksInstance;
  log?: Logger;
  /** Mount `POST /api/vcf/parse`. Defaults to `config.EXPOSE_PARSE`. */
  exposeParse?: boolean;
}

/** Room for multipart boundaries, part headers and the drugs field. */
export const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

async function toUpload(value: unknown): Promise<VcfUpload | null> {
  if (!(value instanceof File)) return null;
  return { name: value.name, content: Buffer.from(await value.arrayBuffer()) };
}

export function createApp(deps: ServerDeps = {}) {
  const log = deps.log ?? createLogger("http");
  const createHooks = deps.createHooks ?? (() => createLoggedHooks());
  const maxBytes = deps.maxBytes ?? config.MAX_VCF_BYTES;
  const tooLarge = uploadLimitMessage(maxBytes);
  const app = new Hono();

  // Middleware
  app.use("*", cors());
  app.use("*", logger((message, ...rest) => log.info([message, ...rest].join(" "))));
  app.use(
    "/api/vcf/*",
    bodyLimit({
      maxSize: maxBytes + MULTIPART_OVERHEAD_BYTES,
      onError: (c) => c.json({ error: tooLarge }, 400),
    }),
  );

  app.get("/api/health", (c) =>
    c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      panel: [...REQUIRED_PANEL],
    }),
  );

  app.get("/api/reference/drugs", (c) =>
    c.json({
      drugs: drugRules.supportedDrugs.map((drug) => ({ drug, gene: drugRules.find(drug)?.gene ?? null })),
    }),
  );

  app.post("/api/vcf/analyse", async (c) => {
    const body = await c.req.parseBody();
    const upload = await toUpload(body["file"]);
    const drugs = body["drugs"];
    if (typeof drugs !== "string") throw new AnalysisInputError("Missing drugs parameter");

    const reports = await analyse(upload, drugs, { ...deps, hooks: createHooks() });
    return c.json(reports);
  });

  if (deps.exposeParse ?? config.EXPOSE_PARSE) {
    app.post("/api/vcf/parse", async (c) => {
      const body = await c.req.parseBody();
      return c.json(parseUpload(await toUpload(body["file"]), deps.maxBytes));
    });
  }

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof AnalysisInputError) return c.json({ error: err.message }, 400);
    // Body read cut short by the upload limit.
    if (err.name === "BodyLimitError") return c.json({ error: tooLarge }, 400);
    log.error(`request failed: ${err.message}`);
    return c.json({ error: err.message }, 500);
  });

  return app;
}
