#!/usr/bin/env node
import cron from "node-cron";
import { createServices, processNewEmails } from "./scheduler";
import { loadConfig, loadDotenv } from "./utils/config";
import { logger } from "./utils/logger";

async function main() {
  loadDotenv();
  const config = loadConfig();
  logger.info("Job Tracker starting up...");

  const services = await createServices(config);

  logger.info("Running email scan...");
  await processNewEmails(services, config.pipeline);

  const schedule = config.cron.schedule;
  if (!schedule) return;

  if (!cron.validate(schedule)) {
    throw new Error(`Invalid CRON_SCHEDULE: ${schedule}`);
  }

  let running = false;
  logger.info(`Scheduling cron: ${schedule}`);
  cron.schedule(schedule, async () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    logger.info("Cron triggered - checking for new emails...");
    try {
      await processNewEmails(services, config.pipeline);
    } catch (error) {
      logger.error("Cron run failed", error);
    } finally {
      running = false;
    }
  });

  logger.info("Job Tracker is running. Press Ctrl+C to stop.");
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
