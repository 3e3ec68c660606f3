import { createReadStream } from "node:fs";
import { serve } from "@hono/node-server";
import { runCli, type CliIO } from "./cli.ts";
import { rootLogger } from "./logger.ts";
import { createApp } from "./server.ts";

const io: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  openFile: (path) => createReadStream(path),
  serve: (port) => {
    serve({ fetch: createApp().fetch, port }, (info) => {
      rootLogger.info(`listening on http://localhost:${info.port}`);
    });
  },
};

runCli(process.argv.slice(2), io)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
