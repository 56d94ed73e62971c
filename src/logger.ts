import type { Logger } from "./types.js";

const PREFIX = "[iris-singularity-tools]";

export function createConsoleLogger(params: {
  verbose?: boolean;
  write?: (line: string) => void;
} = {}): Logger {
  const write = params.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return {
    debug: (message) => {
      if (params.verbose) {
        write(`${PREFIX} debug: ${message}`);
      }
    },
    info: (message) => write(`${PREFIX} ${message}`),
    warn: (message) => write(`${PREFIX} warning: ${message}`),
    error: (message) => write(`${PREFIX} error: ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
