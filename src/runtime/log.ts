import type winston from "winston";

import { createStderrLogger } from "../core/logger.js";

export type EngineLog = {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
};

let engineLogger: winston.Logger | undefined;

function engine(): winston.Logger {
  engineLogger ??= createStderrLogger({ name: "engine", level: "debug", prefix: false });
  return engineLogger;
}

/** Engine-facing diagnostics. Written to stderr; forwarding to the engine itself lives elsewhere. */
export const log: EngineLog = {
  error: (message) => {
    engine().error(message);
  },
  warn: (message) => {
    engine().warning(message);
  },
  info: (message) => {
    engine().info(message);
  },
  debug: (message) => {
    engine().debug(message);
  },
};
