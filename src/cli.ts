#!/usr/bin/env node
import "dotenv/config";
import { runCommand } from "./commands.js";
import { loadConfig } from "./config.js";
import { createServices } from "./services/context.js";
import { buildScheduledJobs } from "./services/jobs.js";
import { Scheduler } from "./services/scheduler.js";

async function runScheduler(): Promise<void> {
  const config = loadConfig();
  const services = await createServices(config);
  const scheduler = new Scheduler(buildScheduledJobs(services, config), {
    tick: config.scheduler.tick,
  });
  scheduler.start();

  const shutdown = async (signal: string) => {
    console.log(`[Scheduler] ${signal} received, shutting down...`);
    await scheduler.stop();
    await services.close();
  };

  await new Promise<void>((resolve, reject) => {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).then(resolve, reject);
      });
    }
  });
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);

  if (command === "scheduler") {
    await runScheduler();
    return 0;
  }

  const config = loadConfig();
  const services = await createServices(config);
  try {
    return await runCommand(command, args, services);
  } finally {
    await services.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Command failed:", err);
    process.exitCode = 1;
  });
