/**
 * Terminal prompts.
 */

import inquirer from "inquirer";
import type { Prompter } from "../types.js";

export class TerminalPrompter implements Prompter {
  /** When set, every confirmation is answered yes without asking. */
  private readonly assumeYes: boolean;

  constructor(opts: { assumeYes?: boolean } = {}) {
    this.assumeYes = opts.assumeYes ?? false;
  }

  async confirm(message: string): Promise<boolean> {
    if (this.assumeYes) return true;
    const { ok } = await inquirer.prompt<{ ok: boolean }>([
      {
        type: "confirm",
        name: "ok",
        message,
        default: false,
      },
    ]);
    return ok;
  }

  async secret(message: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: "password",
        name: "value",
        message,
      },
    ]);
    return value;
  }
}
