import { runCli } from "./cli";
import logger from "./utils/logger";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, "crossword-csp failed");
    process.exitCode = 2;
  });
