import "dotenv/config";
import { run } from "./app.js";
import { createLogger } from "./logger.js";

async function main() {
  const logger = createLogger();

  return run(process.argv.slice(2), {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    logger,
    clearScreen: process.stdout.isTTY === true,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Tournament failed:", err);
    process.exit(1);
  });
