import pino from "pino";

import { loadValidatorConfig, type ValidatorConfig } from "./config";

let rootLogger: pino.Logger | undefined;

export function createRootLogger(config: ValidatorConfig, destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    base: { service: config.serviceName },
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}

/** Category logger on the shared root; the root is built from env on first use. */
export function getLogger(category: string): pino.Logger {
  if (!rootLogger) rootLogger = createRootLogger(loadValidatorConfig());
  return rootLogger.child({ category });
}
