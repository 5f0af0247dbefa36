// src/terminal-ui.ts — Full-screen form on a TTY
// renderScreen is a pure projection of the session; TerminalForm owns the key loop.

import { emitKeypressEvents } from "node:readline";
import { createInterface } from "node:readline/promises";
import type { Interface } from "node:readline/promises";
import type { ReadStream, WriteStream } from "node:tty";
import type { FormSession } from "./session.js";
import type { FieldRow } from "./types.js";

// ─── Screen projection ───────────────────────────────────────────────────────

export type LineStyle = "title" | "header" | "mandatory" | "optional" | "cursor" | "divider" | "help" | "status";

export interface ScreenLine {
  text: string;
  style: LineStyle;
}

export interface Screen {
  lines: ScreenLine[];
  scrollTop: number;
}

export interface ScreenSize {
  rows: number;
  columns: number;
}

const LABEL_WIDTH = 20;
/** Title, divider, help and status lines. */
const CHROME_LINES = 4;

/**
 * Lay out the visible rows in a window that follows the cursor.
 * `scrollTop` is the previous frame's offset into the visible rows.
 */
export function renderScreen(
  session: FormSession,
  size: ScreenSize,
  scrollTop: number,
  status = "",
): Screen {
  const width = Math.max(size.columns, 1);
  const viewHeight = Math.max(size.rows - CHROME_LINES, 1);
  const rows = session.visibleRows();
  const cursorPos = Math.max(rows.findIndex((r) => r.index === session.cursor), 0);

  let top = Math.min(Math.max(scrollTop, 0), Math.max(rows.length - 1, 0));
  if (cursorPos < top) top = cursorPos;
  if (cursorPos >= top + viewHeight) top = cursorPos - viewHeight + 1;

  const lines: ScreenLine[] = [
    {
      text: fit(` cnfgen | ${session.schema.name} | Fields: ${session.registry.size} | ↑/↓ move  Enter edit  ←/→ cycle  s save  q quit`, width),
      style: "title",
    },
  ];
  for (const row of rows.slice(top, top + viewHeight)) {
    lines.push({ text: fit(formatRow(row), width), style: rowStyle(row, session.cursor) });
  }
  lines.push({ text: "─".repeat(width), style: "divider" });
  lines.push({ text: fit(`HELP: ${session.current.help}`, width), style: "help" });
  lines.push({ text: fit(status, width), style: "status" });
  return { lines, scrollTop: top };
}

export function formatRow(row: FieldRow): string {
  if (row.kind === "header") return row.label;
  const marker = row.isDropdown ? "▾" : " ";
  return `    ${row.label.padEnd(LABEL_WIDTH)} :${marker}${row.value}`;
}

function rowStyle(row: FieldRow, cursor: number): LineStyle {
  if (row.kind === "header") return "header";
  if (row.index === cursor) return "cursor";
  return row.kind;
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text;
}

// ─── Keys ────────────────────────────────────────────────────────────────────

export interface KeyPress {
  name?: string;
  ctrl?: boolean;
  sequence?: string;
}

export type KeyAction = "next" | "prev" | "edit" | "cycle-forward" | "cycle-back" | "save" | "quit" | "none";

export function keyAction(key: KeyPress): KeyAction {
  if (key.ctrl && key.name === "c") return "quit";
  switch (key.name) {
    case "down":
    case "j":
      return "next";
    case "up":
    case "k":
      return "prev";
    case "right":
      return "cycle-forward";
    case "left":
      return "cycle-back";
    case "return":
    case "enter":
      return "edit";
    case "s":
      return "save";
    case "q":
      return "quit";
    default:
      return "none";
  }
}

// ─── Edit prompt ─────────────────────────────────────────────────────────────

/** 1-based menu answer to a zero-based option index; anything but plain digits in range is refused. */
export function parseChoice(answer: string, size: number): number | undefined {
  if (!/^\d+$/.test(answer)) return undefined;
  const choice = Number(answer);
  return choice >= 1 && choice <= size ? choice - 1 : undefined;
}

/**
 * Ask one question. Ctrl-C cancels only this prompt and resolves `undefined`;
 * `prefill` is typed into the line so the operator edits the current value.
 */
export async function promptLine(rl: Interface, query: string, prefill = ""): Promise<string | undefined> {
  const cancel = new AbortController();
  const onInterrupt = (): void => cancel.abort();
  rl.on("SIGINT", onInterrupt);
  try {
    const pending = rl.question(query, { signal: cancel.signal });
    if (prefill !== "") rl.write(prefill);
    return await pending;
  } catch (err: unknown) {
    if (cancel.signal.aborted) return undefined;
    throw err;
  } finally {
    rl.off("SIGINT", onInterrupt);
  }
}

// ─── Terminal loop ───────────────────────────────────────────────────────────

const ESC = "\u001b[";
const STYLE_CODES: Record<LineStyle, string> = {
  title: `${ESC}37;44m`,
  header: `${ESC}1m`,
  mandatory: `${ESC}31m`,
  optional: `${ESC}32m`,
  cursor: `${ESC}30;46m`,
  divider: "",
  help: `${ESC}32m`,
  status: `${ESC}1m`,
};
const RESET = `${ESC}0m`;

export interface TerminalFormOptions {
  outputDir: string;
  input: ReadStream;
  output: WriteStream;
}

export class TerminalForm {
  private scrollTop = 0;
  private status = "";
  private readonly pending: KeyPress[] = [];
  private waiter: ((key: KeyPress) => void) | undefined;
  /** Keys typed into an edit prompt belong to readline, not the form. */
  private editing = false;

  constructor(
    private readonly session: FormSession,
    private readonly options: TerminalFormOptions,
  ) {}

  async run(): Promise<void> {
    const { input, output } = this.options;
    emitKeypressEvents(input);
    const onKey = (_str: string | undefined, key: KeyPress | undefined): void => {
      if (!key || this.editing) return;
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = undefined;
        resolve(key);
      } else {
        this.pending.push(key);
      }
    };
    input.on("keypress", onKey);
    this.setRaw(true);
    output.write(`${ESC}?25l`);

    try {
      for (;;) {
        this.draw();
        const action = keyAction(await this.nextKey());
        if (action === "quit") break;
        await this.perform(action);
      }
    } finally {
      input.off("keypress", onKey);
      this.setRaw(false);
      input.pause();
      output.write(`${RESET}${ESC}?25h${ESC}2J${ESC}H`);
    }
  }

  private async perform(action: KeyAction): Promise<void> {
    switch (action) {
      case "next":
        this.session.moveNext();
        return;
      case "prev":
        this.session.movePrev();
        return;
      case "cycle-forward":
        this.session.cycle(1);
        return;
      case "cycle-back":
        this.session.cycle(-1);
        return;
      case "edit":
        await this.edit();
        return;
      case "save": {
        const result = this.session.commit(this.options.outputDir);
        this.status = result.ok
          ? `SUCCESS: ${result.path} saved${result.warnings.length > 0 ? ` (${result.warnings.map((w) => w.message).join("; ")})` : ""}`
          : `ERR: ${result.message}`;
        return;
      }
      case "quit":
      case "none":
        return;
    }
  }

  private async edit(): Promise<void> {
    const field = this.session.current;
    this.editing = true;
    this.setRaw(false);
    const { output } = this.options;
    output.write(`${RESET}${ESC}?25h${ESC}2J${ESC}H`);
    output.write(`[ ${field.label} ]\n${field.help}\n\n`);
    const rl = createInterface({ input: this.options.input, output, terminal: true });
    try {
      if (field.options) {
        field.options.entries().forEach((o, i) => {
          const mark = i === field.options?.selectedIndex ? "*" : " ";
          output.write(` ${mark}${String(i + 1).padStart(3)}. ${o.label}\n`);
        });
        const reply = await promptLine(rl, `Choice [${field.options.selectedIndex + 1}]: `);
        if (reply === undefined) {
          this.status = "Edit cancelled";
          return;
        }
        const answer = reply.trim();
        if (answer === "") return;
        const choice = parseChoice(answer, field.options.size);
        if (choice === undefined) {
          this.status = `ERR: "${answer}" is not a choice between 1 and ${field.options.size}`;
          return;
        }
        this.session.select(choice);
      } else {
        const answer = await promptLine(rl, "Enter value: ", field.value);
        if (answer === undefined) {
          this.status = "Edit cancelled";
          return;
        }
        const updated = this.session.setValue(answer.trim());
        if (updated.normalize === "identity" && updated.value !== answer.trim()) {
          this.status = `${updated.label} normalized to ${updated.value}`;
        }
      }
    } finally {
      rl.close();
      this.editing = false;
      this.setRaw(true);
      output.write(`${ESC}?25l`);
    }
  }

  private draw(): void {
    const { output } = this.options;
    const screen = renderScreen(
      this.session,
      { rows: output.rows ?? 24, columns: output.columns ?? 80 },
      this.scrollTop,
      this.status,
    );
    this.scrollTop = screen.scrollTop;
    this.status = "";
    const painted = screen.lines.map((l) => {
      const code = STYLE_CODES[l.style];
      return code ? `${code}${l.text}${RESET}` : l.text;
    });
    output.write(`${ESC}2J${ESC}H${painted.join("\n")}`);
  }

  private nextKey(): Promise<KeyPress> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private setRaw(raw: boolean): void {
    const { input } = this.options;
    if (input.isTTY) input.setRawMode(raw);
    if (raw) input.resume();
  }
}
