import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { CONFIG_PATH, DEBUG_MODE, LOG_FILE } from "./env";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  try {
    const app = buildApplication({ configPath: CONFIG_PATH, debug: DEBUG_MODE });
    try {
      const report = app.run();
      console.log(`All ${report.checks.length} device checks passed.`);
    } finally {
      app.shutdown();
    }
  } finally {
    await loggingHandle.shutdown();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
