import "dotenv/config";
import { createApp } from "./app.js";
import { loadAppConfig } from "./config/app.config.js";
import { JobOrchestrator } from "./jobs/job.orchestrator.js";
import { createGenerationBackend } from "./services/question-generation.service.js";
import { findAvailablePort } from "./utils/port.js";

async function main() {
  const config = loadAppConfig();
  const { backend, client } = createGenerationBackend(config);

  if (backend.state === "unavailable") {
    console.warn(`[server] Question generation unavailable: ${backend.reason}`);
  } else {
    console.log(`[server] Generation provider: ${config.provider}`);
  }

  if (client && config.validateApiKeyOnStart) {
    const probe = await client.validateApiKey();
    if (probe.success) {
      console.log("[server] API key is valid");
    } else if (probe.errorKind === "quota") {
      console.log("[server] API quota exceeded - generation will work once quota is restored");
    } else {
      console.warn(`[server] API key validation failed: ${probe.error}`);
    }
  }

  const orchestrator = new JobOrchestrator({
    uploadDir: config.uploadDir,
    generatedDir: config.generatedDir,
    backend,
    maxConcurrentJobs: config.maxConcurrentJobs,
    maxQueuedJobs: config.maxQueuedJobs,
    jobTtlMs: config.jobTtlMs,
  });
  await orchestrator.init();
  orchestrator.startEvictionSweep(config.evictionIntervalMs);

  const app = createApp({ orchestrator, maxUploadBytes: config.maxUploadBytes });
  const port = config.port ?? (await findAvailablePort());
  const server = app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`Access the application at: http://localhost:${port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[server] ${signal} received, shutting down gracefully...`);
    server.close();
    const abandoned = await orchestrator.shutdown(config.shutdownGraceMs);
    process.exit(abandoned > 0 ? 1 : 0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("[server] Shutdown failed", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("[server] Failed to start", err);
  process.exit(1);
});
