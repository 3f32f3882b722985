import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { createResponseCache, describeError, getLogger, loadConfig } from "@llm-html/core";
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

function main() {
  const config = loadConfig(process.env);
  const logger = getLogger("api", config.log);
  const cache = createResponseCache(config.cache);
  const app = createApp({ config, cache, logger });

  app.listen(config.api_port, () => {
    logger.info("api.listen", {
      port: config.api_port,
      default_model: config.default_model,
      cache: config.cache.dir ? "file" : "memory",
    });
  });
}

try {
  main();
} catch (e) {
  getLogger("api").error("api.start.failed", { error: describeError(e) });
  process.exitCode = 1;
}
