import "dotenv/config";

import { loadWorkerConfig } from "./config";
import { createService, summarizePass } from "./service";

const service = createService(loadWorkerConfig());

void (async () => {
  const results = await service.runSheetPass();
  console.log(`[worker] ${summarizePass(results)}`);
  process.exit(0);
})();
