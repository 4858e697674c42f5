import { Logger } from "@aws-lambda-powertools/logger";
import { getEnv } from "@/lib/env";

export const logger = new Logger({
  serviceName: "quote-comparison",
  logLevel: getEnv().LOG_LEVEL,
});
