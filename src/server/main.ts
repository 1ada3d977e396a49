// Load envs from .env
import "dotenv/config";
import path from "path";
import { createServices } from "../bootstrap";
import { generateInvestmentReport } from "../reporting/application/generate_investment_report";
import { loadAppConfig } from "../reporting/config";
import { getLogger } from "../util/logger";
import { errorMessage } from "../util/result";
import { createApp } from "./app";
import { RunRegistry } from "./run_registry";

const log = getLogger("server");

function main(): void {
  const config = loadAppConfig();
  const { pipeline, tracer } = createServices(config);
  const registry = new RunRegistry({
    runReport: (input) => generateInvestmentReport(input, pipeline).finally(() => tracer.flush()),
  });
  const app = createApp({
    registry,
    publicDir: path.resolve(process.cwd(), "public"),
  });
  app.listen(config.port, () => {
    log.info({ port: config.port, outputDir: config.outputDir }, "Listening");
  });
}

try {
  main();
} catch (error) {
  log.fatal({ error: errorMessage(error) }, "Server failed to start");
  process.exitCode = 1;
}
