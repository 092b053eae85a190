export interface CommandEntry {
  readonly command: string;
  readonly timestamp: Date;
}

/**
 * Ranked output drops the original timestamp (it is never redisplayed)
 * and carries the epoch instead.
 */
export type RankedList = CommandEntry[];

export type Query = string | null;

export type KeyEvent =
  | { name: "char"; char: string; ctrl: boolean }
  | {
      name:
        | "backspace"
        | "enter"
        | "escape"
        | "up"
        | "down"
        | "tab"
        | "backtab"
        | "other";
    };

export type KeyAction =
  | { type: "continue"; redraw: boolean }
  | { type: "select"; command: string }
  | { type: "exit" };

export interface TerminalSize {
  columns: number;
  rows: number;
}

export type Color = "black" | "white" | "yellow";

export interface TextStyle {
  fg?: Color;
  bg?: Color;
}

export type DrawCommand =
  | { type: "moveTo"; column: number; row: number }
  | { type: "clearLine" }
  | { type: "print"; text: string; style?: TextStyle };
