#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { EXIT_CODES, main, writeFatalError } from "./src/index.js";

export { main };

// Allow `node dist/index.js` and the installed bin link to run the host directly.
if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  void main(process.argv).then(
    (exitCode) => {
      process.exit(exitCode);
    },
    (error: unknown) => {
      // Teardown faults (scheduler close, stream flush) are fatal and propagate to here.
      writeFatalError(error);
      process.exit(EXIT_CODES.failure);
    },
  );
}
