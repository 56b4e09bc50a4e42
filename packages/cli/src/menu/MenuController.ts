import { createInterface } from "node:readline";
import type { Logger } from "pino";
import { getLogger } from "../logging/logger.js";
import type { Project } from "../projects/index.js";
import { formatListing, formatProjectDetails } from "./render.js";
import { classifySelection, invalidSelectionMessage } from "./selection.js";

export type MenuState =
  | "listing"
  | "awaiting-selection"
  | "showing-detail"
  | "terminated";

export type MenuExitReason =
  | "quit"
  | "interrupted"
  | "input-closed"
  | "no-projects";

export const INPUT_PROMPT = "> ";

export interface MenuControllerOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Interrupt flag owned by the caller; aborting it ends the loop */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Numbered project menu driven by line input.
 *
 * Prints the listing once, then reads one line per iteration until the user
 * quits, input ends, or the interrupt signal fires. Invalid input gets a short
 * message and a fresh prompt, never the full listing again.
 */
export class MenuController {
  private state: MenuState = "listing";
  private log: Logger;

  constructor(
    private readonly projects: readonly Project[],
    private readonly options: MenuControllerOptions,
  ) {
    this.log = (options.logger ?? getLogger()).child({ component: "menu" });
  }

  getState(): MenuState {
    return this.state;
  }

  async run(): Promise<MenuExitReason> {
    const { input, output, signal } = this.options;

    if (signal?.aborted) {
      this.state = "terminated";
      return "interrupted";
    }

    this.writeLines(formatListing(this.projects));
    if (this.projects.length === 0) {
      this.state = "terminated";
      return "no-projects";
    }

    const rl = createInterface({ input, output });
    // Grab the iterator before anything can emit a line
    const lines = rl[Symbol.asyncIterator]();
    let closed = false;
    let interrupted = false;
    rl.once("close", () => {
      closed = true;
    });

    // Closing the reader unblocks the pending line read
    const interrupt = () => {
      interrupted = true;
      if (!closed) rl.close();
    };
    signal?.addEventListener("abort", interrupt, { once: true });
    // On a terminal readline captures Ctrl+C itself instead of raising SIGINT
    rl.on("SIGINT", interrupt);

    let reason: MenuExitReason = "input-closed";
    try {
      this.state = "awaiting-selection";
      rl.setPrompt(INPUT_PROMPT);
      rl.prompt();

      for await (const line of lines) {
        if (interrupted) break;

        const selection = classifySelection(line, this.projects.length);
        if (selection.kind === "quit") {
          reason = "quit";
          break;
        }

        if (selection.kind === "invalid") {
          this.log.debug(
            { input: selection.input, reason: selection.reason },
            "Invalid selection",
          );
          this.writeLines([invalidSelectionMessage(selection.reason)]);
        } else {
          const project = this.projects[selection.index - 1];
          if (project) {
            this.state = "showing-detail";
            this.writeLines(formatProjectDetails(project));
          }
        }

        this.state = "awaiting-selection";
        rl.prompt();
      }
    } finally {
      signal?.removeEventListener("abort", interrupt);
      if (!closed) rl.close();
      this.state = "terminated";
    }

    if (interrupted) {
      reason = "interrupted";
      output.write("\nProgram interrupted. Exiting...\n");
    } else if (reason === "quit") {
      this.writeLines(["Exiting program..."]);
    }
    this.log.debug({ reason }, "Menu closed");
    return reason;
  }

  private writeLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.options.output.write(`${line}\n`);
    }
  }
}
