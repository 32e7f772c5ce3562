/**
 * Diagnostics go to stderr so stdout stays clean for results.
 * Info lines only appear with --verbose.
 */

import chalk from "chalk";
import type { LogFn } from "../types.js";

export function createLogger(opts: { verbose: boolean }, write: (line: string) => void = (l) => process.stderr.write(`${l}\n`)): LogFn {
  return (level, msg) => {
    switch (level) {
      case "error":
        write(chalk.red(msg));
        break;
      case "warn":
        write(chalk.yellow(msg));
        break;
      case "info":
        if (opts.verbose) write(chalk.dim(msg));
        break;
    }
  };
}
