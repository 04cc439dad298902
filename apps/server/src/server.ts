import Fastify from "fastify";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { EngineConfigRejected } from "@ews/risk-engine";

import { registerEwsApp } from "./app";
import { loadEnv, readConfigFile, readServerSettings, resolveClock } from "./env";
import { EwsRuntime } from "./runtime";

// Repo root .env first, then the app's own; explicitly provided env vars always win.
const __dirname = path.dirname(fileURLToPath(import.meta.url));
loadEnv([path.resolve(__dirname, "..", "..", ".."), path.resolve(__dirname, "..")]);

const app = Fastify({ logger: true });

async function main(): Promise<void> {
  const settings = readServerSettings(process.env, process.cwd());
  const runtime = new EwsRuntime(readConfigFile(settings.configPath), { clock: resolveClock(settings.clock) });
  app.log.info(
    { config_path: settings.configPath, config_hash: runtime.configHash, zones: runtime.zones(), clock: settings.clock },
    "engine configuration admitted"
  );

  registerEwsApp(app, runtime);
  await app.listen({ port: settings.port, host: settings.host });
}

main().catch((err) => {
  if (err instanceof EngineConfigRejected) {
    app.log.error({ errors: err.errors }, "engine configuration rejected");
  } else {
    app.log.error(err);
  }
  process.exit(1);
});
