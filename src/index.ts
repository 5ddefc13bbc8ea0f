import "dotenv/config";
import type { Server } from "http";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createServices, type Services } from "./services/context.js";
import { buildScheduledJobs } from "./services/jobs.js";
import { Scheduler } from "./services/scheduler.js";

let server: Server | undefined;
let scheduler: Scheduler | undefined;
let services: Services | undefined;

async function start() {
  const config = loadConfig();
  services = await createServices(config);

  if (config.scheduler.enabled) {
    scheduler = new Scheduler(buildScheduledJobs(services, config), {
      tick: config.scheduler.tick,
    });
  }

  const app = createApp(services, { corsOrigins: config.corsOrigins, scheduler });
  server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
  });

  scheduler?.start();
}

// Let the running job finish before exiting
async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down...`);
  server?.close();
  await scheduler?.stop();
  await services?.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("Shutdown failed:", error);
      process.exitCode = 1;
    });
  });
}

start().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
