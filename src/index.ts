import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

runCli(process.argv).catch((error: unknown) => {
  logger.error({ err: error }, "CLI failed");
  process.exitCode = 1;
});
