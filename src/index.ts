import { Main } from "./cli";
import { logger } from "./utils/logger";

Main().catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
});
