/**
 * Terminal capability surface
 *
 * The dashboard only needs curses-style primitives: cursor movement,
 * clearing, attributed text and single-key input. VirtualTerminal keeps
 * the screen as a grid of cells; the ink TUI paints that grid and feeds
 * keypresses back into it.
 */

export interface TextAttributes {
  underline?: boolean;
  /** Reverse video, used for column headings and status messages */
  standout?: boolean;
}

export interface TerminalSurface {
  readonly rows: number;
  readonly columns: number;
  /** Move the cursor; subsequent `write` and `clear*` calls start there */
  move(row: number, col: number): void;
  /** Blank from the cursor to the end of its row */
  clearToEol(): void;
  /** Blank from the cursor to the end of the screen */
  clearToBottom(): void;
  /** Write at the cursor and advance it */
  write(text: string, attrs?: TextAttributes): void;
  /** Write at a position, keeping at most `width` characters */
  writeAt(row: number, col: number, text: string, width?: number, attrs?: TextAttributes): void;
  /** Publish pending changes to the screen */
  refresh(): void;
  /** Wait for the next keypress */
  readKey(): Promise<string>;
}

interface Cell {
  char: string;
  underline: boolean;
  standout: boolean;
}

/** A run of adjacent cells sharing the same attributes */
export interface Segment {
  text: string;
  underline: boolean;
  standout: boolean;
}

const BLANK: Cell = { char: ' ', underline: false, standout: false };

export class VirtualTerminal implements TerminalSurface {
  readonly rows: number;
  readonly columns: number;

  private readonly grid: Cell[][];
  private cursorRow = 0;
  private cursorCol = 0;

  private readonly pendingKeys: string[] = [];
  private readonly keyWaiters: Array<(key: string) => void> = [];
  private readonly refreshListeners = new Set<() => void>();

  constructor(rows = 24, columns = 100) {
    this.rows = rows;
    this.columns = columns;
    this.grid = Array.from({ length: rows }, () => this.blankRow());
  }

  move(row: number, col: number): void {
    this.cursorRow = Math.max(0, Math.min(row, this.rows - 1));
    this.cursorCol = Math.max(0, Math.min(col, this.columns));
  }

  clearToEol(): void {
    const row = this.grid[this.cursorRow];
    for (let col = this.cursorCol; col < this.columns; col++) {
      row[col] = BLANK;
    }
  }

  clearToBottom(): void {
    this.clearToEol();
    for (let row = this.cursorRow + 1; row < this.rows; row++) {
      this.grid[row] = this.blankRow();
    }
  }

  write(text: string, attrs: TextAttributes = {}): void {
    const row = this.grid[this.cursorRow];
    const cell = { underline: attrs.underline ?? false, standout: attrs.standout ?? false };

    for (const char of text) {
      if (this.cursorCol >= this.columns) break;
      row[this.cursorCol] = { char, ...cell };
      this.cursorCol++;
    }
  }

  writeAt(row: number, col: number, text: string, width?: number, attrs?: TextAttributes): void {
    if (row < 0 || row >= this.rows) return;
    this.move(row, col);
    this.write(width === undefined ? text : [...text].slice(0, width).join(''), attrs);
  }

  refresh(): void {
    for (const listener of this.refreshListeners) {
      listener();
    }
  }

  readKey(): Promise<string> {
    const key = this.pendingKeys.shift();
    if (key !== undefined) {
      return Promise.resolve(key);
    }
    return new Promise((resolve) => {
      this.keyWaiters.push(resolve);
    });
  }

  /** Deliver a keypress to the oldest `readKey` caller, or queue it */
  pushKey(key: string): void {
    const waiter = this.keyWaiters.shift();
    if (waiter) {
      waiter(key);
    } else {
      this.pendingKeys.push(key);
    }
  }

  /** Subscribe to `refresh` calls; returns the unsubscribe function */
  onRefresh(listener: () => void): () => void {
    this.refreshListeners.add(listener);
    return () => {
      this.refreshListeners.delete(listener);
    };
  }

  /** Text of one row with trailing blanks removed */
  line(row: number): string {
    return this.grid[row].map((cell) => cell.char).join('').trimEnd();
  }

  /** All rows up to the last non-blank one */
  lines(): string[] {
    const all = this.grid.map((_, row) => this.line(row));
    let end = all.length;
    while (end > 0 && all[end - 1] === '') end--;
    return all.slice(0, end);
  }

  segments(row: number): Segment[] {
    const segments: Segment[] = [];
    for (const cell of this.grid[row]) {
      const last = segments[segments.length - 1];
      if (last && last.underline === cell.underline && last.standout === cell.standout) {
        last.text += cell.char;
      } else {
        segments.push({ text: cell.char, underline: cell.underline, standout: cell.standout });
      }
    }
    return segments;
  }

  private blankRow(): Cell[] {
    return Array.from({ length: this.columns }, () => BLANK);
  }
}
