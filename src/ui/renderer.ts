import { DrawCommand, TextStyle } from "../types/index.js";
import { SessionSnapshot } from "./session.js";
import { Terminal } from "./terminal.js";

export const INPUT_PREFIX = "> ";

const SELECTED_STYLE: TextStyle = { fg: "black", bg: "white" };

/**
 * Split `command` around the first case-insensitive occurrence of `query`.
 */
export function splitHighlight(
  command: string,
  query: string
): { before: string; match: string; after: string } | null {
  if (query.length === 0) {
    return null;
  }
  const start = command.toLowerCase().indexOf(query.toLowerCase());
  if (start === -1) {
    return null;
  }
  const end = start + query.length;
  return {
    before: command.slice(0, start),
    match: command.slice(start, end),
    after: command.slice(end),
  };
}

export function inputLine(input: string, width: number): string {
  return `${INPUT_PREFIX}${input}`.padEnd(width);
}

/**
 * First visible match row, scrolled just far enough that the selection
 * stays on screen.
 */
export function visibleOffset(selectedIndex: number, capacity: number): number {
  if (capacity === 0) {
    return 0;
  }
  return Math.max(0, selectedIndex - capacity + 1);
}

/** Cut a row to the terminal width so it never wraps. */
function fitWidth(text: string, columns: number): string {
  const chars = Array.from(text);
  return chars.length > columns ? chars.slice(0, columns).join("") : text;
}

/**
 * Turns session state into one batched frame of draw commands.
 */
export class Renderer {
  constructor(private readonly terminal: Terminal) {}

  frame(state: SessionSnapshot): DrawCommand[] {
    const { columns, rows } = this.terminal.size();
    const commands: DrawCommand[] = [];

    // Clear every row below the input, not just the ones drawn last time
    for (let row = 1; row < rows; row++) {
      commands.push({ type: "moveTo", column: 0, row }, { type: "clearLine" });
    }

    const capacity = Math.max(0, rows - 1);
    const offset = visibleOffset(state.selectedIndex, capacity);
    const visible = state.matches.slice(offset, offset + capacity);
    visible.forEach((entry, index) => {
      const rowStyle = offset + index === state.selectedIndex ? SELECTED_STYLE : undefined;
      commands.push({ type: "moveTo", column: 0, row: index + 1 });
      commands.push(...this.matchRow(fitWidth(entry.command, columns), state.query, rowStyle));
    });

    commands.push(
      { type: "moveTo", column: 0, row: 0 },
      { type: "clearLine" },
      { type: "print", text: inputLine(state.input, columns) }
    );

    return commands;
  }

  draw(state: SessionSnapshot): void {
    this.terminal.queue(...this.frame(state));
    this.terminal.flush();
  }

  private matchRow(command: string, query: string | null, rowStyle: TextStyle | undefined): DrawCommand[] {
    const parts = query ? splitHighlight(command, query) : null;
    if (!parts) {
      return [print(command, rowStyle)];
    }

    return [
      print(parts.before, rowStyle),
      print(parts.match, { ...rowStyle, fg: "yellow" }),
      print(parts.after, rowStyle),
    ].filter((segment) => segment.text.length > 0);
  }
}

function print(text: string, style: TextStyle | undefined): Extract<DrawCommand, { type: "print" }> {
  return style ? { type: "print", text, style } : { type: "print", text };
}
