/**
 * User Interaction
 *
 * Interactive flows need to open a browser and talk to the user. Both are
 * interfaces so that applications (and tests) can supply their own.
 */

import { spawn } from "node:child_process";
import prompts from "prompts";
import { PromptCancelledError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";

const logger = createLogger("Browser");

export interface BrowserOpener {
  open(url: string): Promise<void>;
}

export interface UserPrompter {
  /** Show a message to the user */
  show(message: string): void;
  /** Ask the user for a line of input */
  ask(question: string): Promise<string>;
  /** Ask for a password or code without echoing it */
  askSecret(question: string): Promise<string>;
}

/**
 * Opens URLs with the platform's default handler.
 */
export class SystemBrowserOpener implements BrowserOpener {
  open(url: string): Promise<void> {
    const [command, args] = openCommand(url);
    logger.debug("Opening browser", { command });

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "ignore", detached: true });
      child.once("error", reject);
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
  }
}

function openCommand(url: string): [string, string[]] {
  switch (process.platform) {
    case "darwin":
      return ["open", [url]];
    case "win32":
      return ["cmd", ["/c", "start", '""', url.replace(/&/g, "^&")]];
    default:
      return ["xdg-open", [url]];
  }
}

/**
 * Talks to the user on the terminal. Prompts render on stderr so that
 * stdout stays free for the calling program.
 */
export class ConsolePrompter implements UserPrompter {
  show(message: string): void {
    process.stderr.write(`${message}\n`);
  }

  ask(question: string): Promise<string> {
    return this.prompt("text", question);
  }

  askSecret(question: string): Promise<string> {
    return this.prompt("password", question);
  }

  private async prompt(type: "text" | "password", question: string): Promise<string> {
    const response = await prompts(
      {
        type,
        name: "value",
        message: question.replace(/:\s*$/, ""),
        stdout: process.stderr,
      },
      { onCancel }
    );

    const value: unknown = response.value;
    if (typeof value !== "string") {
      throw new PromptCancelledError();
    }
    return value.trim();
  }
}

function onCancel(): void {
  throw new PromptCancelledError();
}
