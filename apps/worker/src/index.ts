import "dotenv/config";

import cron from "node-cron";

import { loadWorkerConfig } from "./config";
import { createService, summarizePass } from "./service";

const config = loadWorkerConfig();
const service = createService(config);
let running = false;

async function executePass() {
  if (running) {
    console.log("[worker] Previous sheet pass still running, skipping this tick");
    return;
  }

  running = true;
  const startedAt = new Date();
  console.log(`[worker] Sheet pass started at ${startedAt.toISOString()}`);

  try {
    const results = await service.runSheetPass();
    console.log(`[worker] Sheet pass finished at ${new Date().toISOString()} (${summarizePass(results)})`);
  } catch (error) {
    console.error("[worker] Sheet pass failed", error);
  } finally {
    running = false;
  }
}

cron.schedule(config.schedule, () => {
  void executePass();
});

console.log(`[worker] Scheduler active with cron: ${config.schedule}`);

if (config.runOnBoot) {
  void executePass();
}
