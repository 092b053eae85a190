import * as readline from "readline";
import { Chalk, type ChalkInstance } from "chalk";
import { Color, DrawCommand, KeyEvent, TerminalSize, TextStyle } from "../types/index.js";
import { TerminalModeError, errorMessage } from "../types/errors.js";
import { getLogger } from "../utils/logger.js";

/**
 * Everything the interactive session needs from a terminal.
 */
export interface Terminal {
  /** Raw input, alternate screen, hidden cursor. */
  enter(): void;
  /** Undo `enter()`. */
  exit(): void;
  size(): TerminalSize;
  /** Next key press, or null once input has ended. */
  readKey(): Promise<KeyEvent | null>;
  queue(...commands: DrawCommand[]): void;
  flush(): void;
}

export const ansi = {
  enterAltScreen: "\x1b[?1049h",
  leaveAltScreen: "\x1b[?1049l",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  resetColor: "\x1b[0m",
  clearLine: "\x1b[2K",
  moveTo: (column: number, row: number) => `\x1b[${row + 1};${column + 1}H`,
};

// 16 colors regardless of what chalk detects for the environment
const painter = new Chalk({ level: 1 });

const BACKGROUNDS = {
  black: "bgBlack",
  white: "bgWhite",
  yellow: "bgYellow",
} as const satisfies Record<Color, keyof ChalkInstance>;

export function styleText(text: string, style: TextStyle | undefined, colors: ChalkInstance = painter): string {
  if (!style || (!style.fg && !style.bg)) {
    return text;
  }
  let styled = colors;
  if (style.fg) {
    styled = styled[style.fg];
  }
  if (style.bg) {
    styled = styled[BACKGROUNDS[style.bg]];
  }
  return styled(text);
}

export function serialize(command: DrawCommand, colors: ChalkInstance = painter): string {
  switch (command.type) {
    case "moveTo":
      return ansi.moveTo(command.column, command.row);
    case "clearLine":
      return ansi.clearLine;
    case "print":
      return styleText(command.text, command.style, colors);
  }
}

/** Shape of a keypress as emitted by readline.emitKeypressEvents. */
export interface Keypress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

function isPrintable(text: string): boolean {
  const chars = Array.from(text);
  if (chars.length !== 1) {
    return false;
  }
  const code = text.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Map a readline keypress onto the session's key vocabulary.
 */
export function decodeKeypress(str: string | undefined, key: Keypress | undefined): KeyEvent {
  if (key?.ctrl) {
    if (key.name === "c" || key.name === "d") {
      return { name: "char", char: key.name, ctrl: true };
    }
    return { name: "other" };
  }

  switch (key?.name) {
    case "return":
    case "enter":
      return { name: "enter" };
    case "backspace":
      return { name: "backspace" };
    case "escape":
      return { name: "escape" };
    case "up":
      return { name: "up" };
    case "down":
      return { name: "down" };
    case "tab":
      return key.shift ? { name: "backtab" } : { name: "tab" };
  }

  if (str !== undefined && !key?.meta && isPrintable(str)) {
    return { name: "char", char: str, ctrl: false };
  }
  return { name: "other" };
}

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalOutput = NodeJS.WritableStream & {
  columns?: number;
  rows?: number;
};

/**
 * Terminal backed by Node streams: raw mode through setRawMode, key
 * decoding through readline keypress events, ANSI escapes for output.
 */
export class NodeTerminal implements Terminal {
  private buffer = "";
  private pendingKeys: KeyEvent[] = [];
  private waiting: ((key: KeyEvent | null) => void)[] = [];
  private ended = false;
  private active = false;

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
    private readonly colors: ChalkInstance = painter
  ) {}

  enter(): void {
    const { input } = this;
    if (!input.isTTY || typeof input.setRawMode !== "function") {
      throw new TerminalModeError("Failed to enable raw mode: input is not a terminal");
    }

    try {
      input.setRawMode(true);
    } catch (error) {
      throw new TerminalModeError(`Failed to enable raw mode: ${errorMessage(error)}`, { cause: error });
    }

    try {
      this.output.write(ansi.enterAltScreen + ansi.hideCursor);
    } catch (error) {
      input.setRawMode(false);
      throw new TerminalModeError(
        `Failed to enter alternate screen and hide cursor: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    readline.emitKeypressEvents(input);
    input.on("keypress", this.onKeypress);
    input.on("end", this.onEnd);
    input.resume();
    this.active = true;
  }

  exit(): void {
    if (!this.active) {
      return;
    }
    this.active = false;

    this.input.removeListener("keypress", this.onKeypress);
    this.input.removeListener("end", this.onEnd);
    this.input.pause();
    this.input.setRawMode?.(false);
    this.output.write(ansi.showCursor + ansi.resetColor + ansi.leaveAltScreen);
  }

  size(): TerminalSize {
    return {
      columns: this.output.columns ?? 80,
      rows: this.output.rows ?? 24,
    };
  }

  readKey(): Promise<KeyEvent | null> {
    const next = this.pendingKeys.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  queue(...commands: DrawCommand[]): void {
    for (const command of commands) {
      this.buffer += serialize(command, this.colors);
    }
  }

  flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    const frame = this.buffer + ansi.resetColor;
    this.buffer = "";
    this.output.write(frame);
  }

  private onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
    const event = decodeKeypress(str, key);
    getLogger().trace(`Key ${JSON.stringify(key?.sequence ?? str ?? "")} decoded as ${event.name}`);

    const resolve = this.waiting.shift();
    if (resolve) {
      resolve(event);
    } else {
      this.pendingKeys.push(event);
    }
  };

  private onEnd = (): void => {
    this.ended = true;
    for (const resolve of this.waiting.splice(0)) {
      resolve(null);
    }
  };
}
