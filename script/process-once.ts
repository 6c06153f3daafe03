import "dotenv/config";
import { loadConfig } from "../server/config";
import { buildServices } from "../server/services";

// One processing cycle for cron-style deployments without a long-running server.
async function processOnce() {
  const config = loadConfig();
  const { services, close } = buildServices(config);

  try {
    const result = await services.processor.runCycle();
    console.log(
      `Processed ${result.processed}, failed ${result.failed}, skipped ${result.skipped}, reminders sent ${result.remindersSent}`
    );
    return result.failed > 0 ? 1 : 0;
  } finally {
    await close();
  }
}

processOnce()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
