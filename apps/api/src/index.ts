import "dotenv/config";
import { createApp } from "./app";
import { supervisorConfigFromEnv } from "./services/config";
import { env } from "./services/env";
import { createLogger } from "./services/logger";
import { RunRegistry } from "./services/runs";
import { IssueTrackerEvidenceSource } from "./sources/github";

const log = createLogger("api");

const issueTracker =
  env.GITHUB_REPO && env.GITHUB_MILESTONE
    ? new IssueTrackerEvidenceSource({ repo: env.GITHUB_REPO, milestone: env.GITHUB_MILESTONE })
    : undefined;

const registry = new RunRegistry(env.RUNS_DIR, supervisorConfigFromEnv(env), issueTracker);
const app = createApp({ registry, logger: log });

const server = app.listen(Number(env.PORT), () => {
  log.info({ port: env.PORT, runsDir: env.RUNS_DIR, issueTracker: Boolean(issueTracker) }, "API listening");
});

function shutdown(signal: string) {
  log.info({ signal }, "shutting down");
  server.close(() => {
    registry.closeAll();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
