import { CommandEntry, KeyAction, KeyEvent, Query, RankedList } from "../types/index.js";
import { rank } from "../search/ranking.js";
import { getLogger } from "../utils/logger.js";

export interface SessionSnapshot {
  input: string;
  query: Query;
  matches: readonly CommandEntry[];
  selectedIndex: number;
}

const CONTINUE: KeyAction = { type: "continue", redraw: false };
const REDRAW: KeyAction = { type: "continue", redraw: true };
const EXIT: KeyAction = { type: "exit" };

/**
 * Input buffer, ranked matches and selection cursor for one interactive run.
 */
export class SearchSession {
  private input = "";
  private query: Query = null;
  private matches: RankedList = [];
  private selectedIndex = 0;

  constructor(
    private readonly history: readonly CommandEntry[],
    private readonly resultLimit: number
  ) {}

  /**
   * Seed the input with an optional initial query and compute the first
   * ranked list.
   */
  start(initialQuery?: string): void {
    this.input = initialQuery ?? "";
    this.query = initialQuery ?? null;
    this.updateMatches();
  }

  snapshot(): SessionSnapshot {
    return {
      input: this.input,
      query: this.query,
      matches: this.matches,
      selectedIndex: this.selectedIndex,
    };
  }

  handleKey(key: KeyEvent): KeyAction {
    const logger = getLogger();

    switch (key.name) {
      case "escape":
        logger.debug("Escape key pressed");
        return EXIT;

      case "char":
        if (key.ctrl) {
          if (key.char === "c" || key.char === "d") {
            logger.debug(`Ctrl+${key.char.toUpperCase()} pressed`);
            return EXIT;
          }
          return CONTINUE;
        }
        logger.debug(`Character '${key.char}' pressed`);
        this.setInput(this.input + key.char);
        return REDRAW;

      case "backspace":
        logger.debug("Backspace pressed");
        // Drop the last code point, not half of a surrogate pair
        this.setInput(Array.from(this.input).slice(0, -1).join(""));
        return REDRAW;

      case "down":
      case "tab":
        logger.debug("Down/Tab key pressed");
        this.selectNext();
        return REDRAW;

      case "up":
      case "backtab":
        logger.debug("Up/Shift+Tab key pressed");
        this.selectPrevious();
        return REDRAW;

      case "enter": {
        logger.debug("Enter key pressed");
        const selected = this.matches[this.selectedIndex];
        return selected ? { type: "select", command: selected.command } : CONTINUE;
      }

      default:
        logger.debug("Other key pressed");
        return CONTINUE;
    }
  }

  private setInput(input: string): void {
    this.input = input;
    this.query = input;
    this.updateMatches();
  }

  private updateMatches(): void {
    getLogger().debug("Update matches");
    this.matches = rank(this.query, this.history, this.resultLimit);
    this.selectedIndex = 0;
  }

  private selectNext(): void {
    const last = Math.max(0, this.matches.length - 1);
    this.selectedIndex = this.selectedIndex >= last ? 0 : this.selectedIndex + 1;
  }

  private selectPrevious(): void {
    const last = Math.max(0, this.matches.length - 1);
    this.selectedIndex = this.selectedIndex === 0 ? last : this.selectedIndex - 1;
  }
}
