import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { llmSettingsFromEnv, retryPolicyFromEnv } from "./config/defaults.js";
import { loadEnv } from "./config/env.js";
import { exchangeInstallationToken } from "./github/auth.js";
import { publishComment } from "./github/comments.js";
import { fetchDiff } from "./github/pulls.js";
import { InstallationTokenCache } from "./github/token-cache.js";
import { generateReview } from "./llm/reviewer.js";
import { ReviewOrchestrator } from "./review/orchestrator.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  const env = loadEnv();
  const log = getLogger();

  const tokens = new InstallationTokenCache(exchangeInstallationToken, {
    safetyMarginMs: env.TOKEN_REFRESH_MARGIN_SECONDS * 1000,
  });
  const llmSettings = llmSettingsFromEnv(env);

  const orchestrator = new ReviewOrchestrator(
    {
      getToken: (installationId) => tokens.getToken(installationId),
      invalidateToken: (installationId) => tokens.invalidate(installationId),
      fetchDiff,
      generateReview: (diff) => generateReview(diff, llmSettings),
      publish: publishComment,
    },
    { retry: retryPolicyFromEnv(env) }
  );

  const app = createApp({ secret: env.GITHUB_WEBHOOK_SECRET, orchestrator });

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "Review bot listening");
  });

  const shutdown = async () => {
    log.info({ pending: orchestrator.pending }, "Shutting down...");
    server.close();
    await orchestrator.drain();
    process.exit(0);
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
