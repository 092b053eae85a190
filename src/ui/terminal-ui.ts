import { CommandEntry } from "../types/index.js";
import { errorMessage } from "../types/errors.js";
import { getLogger } from "../utils/logger.js";
import { SearchSession } from "./session.js";
import { Renderer } from "./renderer.js";
import { NodeTerminal, Terminal } from "./terminal.js";

/**
 * Owns the terminal for one interactive search. The terminal is restored
 * exactly once: from `run()`'s finally block, an explicit `close()`, or
 * the process exit hook, whichever comes first.
 */
export class TerminalUi {
  private closed = false;
  private readonly session: SearchSession;
  private readonly renderer: Renderer;

  private constructor(
    private readonly terminal: Terminal,
    history: readonly CommandEntry[],
    resultLimit: number
  ) {
    this.session = new SearchSession(history, resultLimit);
    this.renderer = new Renderer(terminal);
  }

  /**
   * Put the terminal into interactive mode. Throws TerminalModeError when
   * that is not possible; nothing is left half-initialized in that case.
   */
  static open(
    resultLimit: number,
    history: readonly CommandEntry[],
    terminal: Terminal = new NodeTerminal()
  ): TerminalUi {
    getLogger().debug("Initialize UI");
    terminal.enter();

    const ui = new TerminalUi(terminal, history, resultLimit);
    process.once("exit", ui.close);
    return ui;
  }

  /**
   * Run the event loop and resolve to the selected command, or null when
   * the search was cancelled.
   */
  async run(initialQuery?: string): Promise<string | null> {
    const logger = getLogger();
    logger.debug("Run UI");

    try {
      this.session.start(initialQuery);
      this.renderer.draw(this.session.snapshot());

      for (;;) {
        const key = await this.terminal.readKey();
        if (!key) {
          logger.debug("Input closed");
          return null;
        }

        const action = this.session.handleKey(key);
        switch (action.type) {
          case "select":
            logger.info(`Selected command: ${action.command}`);
            return action.command;
          case "exit":
            return null;
          case "continue":
            if (action.redraw) {
              this.renderer.draw(this.session.snapshot());
            }
            break;
        }
      }
    } finally {
      this.close();
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  close = (): void => {
    if (this.closed) {
      return;
    }
    this.closed = true;
    process.removeListener("exit", this.close);

    getLogger().debug("Cleanup UI");
    try {
      this.terminal.exit();
    } catch (error) {
      getLogger().warn(`Failed to restore terminal state: ${errorMessage(error)}`);
    }
  };
}
