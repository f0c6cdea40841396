/**
 * Operator Console - prompt loop over a readline-style interface
 *
 * Reads a line, parses it, runs it through the CommandHandler and prints the
 * result, until `quit` or the interface closes (Ctrl-C, Ctrl-D, SIGTERM).
 * A pending question() never settles on close in Node 20, so every prompt
 * carries an AbortSignal that fires on close.
 */

import type { Style } from "@delta-hedger/utils";

import type { CommandHandler } from "./command-handler";
import { parseCommand } from "./command-parser";

export interface PromptInterface {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
  on(event: "close", listener: () => void): unknown;
}

export type ConsoleExit = "quit" | "closed";

export class OperatorConsole {
  private readonly rl: PromptInterface;
  private readonly style: Style;
  private readonly print: (lines: readonly string[]) => void;
  private readonly closing = new AbortController();

  constructor(rl: PromptInterface, style: Style, print: (lines: readonly string[]) => void) {
    this.rl = rl;
    this.style = style;
    this.print = print;
    rl.on("close", () => {
      this.closing.abort();
    });
  }

  get closed(): boolean {
    return this.closing.signal.aborted;
  }

  /**
   * Ask a yes/no question. A closed console answers no.
   */
  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(question);
    return answer !== null && /^y(es)?$/i.test(answer.trim());
  }

  /**
   * Run the prompt loop; resolves once the operator quits or the interface closes.
   * Closing the interface is left to the caller.
   */
  async run(handler: Pick<CommandHandler, "handle">, prompt = "hedger> "): Promise<ConsoleExit> {
    while (!this.closed) {
      const line = await this.ask(prompt);
      if (line === null) break;

      const parsed = parseCommand(line);
      if (parsed.isErr()) {
        this.print([this.style.wrap(parsed.error.message, "red")]);
        continue;
      }
      if (parsed.value === null) continue;

      const result = await handler.handle(parsed.value);
      this.print(result.lines);
      if (result.quit) return "quit";
    }
    return "closed";
  }

  private async ask(query: string): Promise<string | null> {
    if (this.closed) return null;
    try {
      return await this.rl.question(query, { signal: this.closing.signal });
    } catch (error) {
      if (this.closed) return null;
      throw error;
    }
  }
}
