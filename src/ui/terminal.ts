// src/ui/terminal.ts
import { terminal } from 'terminal-kit';
import { log, LogLevel } from '../logging';
import { Emitter } from '../utils/emitter';
import type { Disposable } from '../utils/emitter';
import type { CellStyle, Color, Frame } from './frame';
import type { InputEvent } from './keymap';
import type { FrameSink, InputSource } from './renderLoop';
import type { ScreenSize } from './viewState';

const FALLBACK_SIZE: ScreenSize = { width: 80, height: 24 };

const COLORS: Record<Color, () => unknown> = {
  red: () => terminal.red(),
  green: () => terminal.green(),
  yellow: () => terminal.yellow(),
  cyan: () => terminal.cyan(),
  gray: () => terminal.brightBlack(),
  white: () => terminal.white()
};

function sanitizeSize(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

/**
 * Full-screen terminal backed by terminal-kit: paints frames and queues
 * key and resize events for the render loop.
 */
export class TerminalScreen implements FrameSink, InputSource, Disposable {
  private _onDidReceiveInput = new Emitter<void>();
  readonly onDidReceiveInput = this._onDidReceiveInput.event;

  private queue: InputEvent[] = [];
  private active = false;
  private previous: string[] = [];

  public static isSupported(): boolean {
    return process.stdout.isTTY === true && process.stdin.isTTY === true;
  }

  public size(): ScreenSize {
    return {
      width: sanitizeSize(terminal.width, FALLBACK_SIZE.width),
      height: sanitizeSize(terminal.height, FALLBACK_SIZE.height)
    };
  }

  public open(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    terminal.fullscreen(true);
    terminal.hideCursor();
    terminal.grabInput(true);
    terminal.on('key', this.onKey);
    terminal.on('resize', this.onResize);
  }

  private readonly onKey = (name: string) => {
    if (this.active) {
      this.push({ type: 'key', key: name });
    }
  };

  private readonly onResize = (width: number, height: number) => {
    if (this.active) {
      this.previous = [];
      this.push({
        type: 'resize',
        width: sanitizeSize(width, FALLBACK_SIZE.width),
        height: sanitizeSize(height, FALLBACK_SIZE.height)
      });
    }
  };

  private push(event: InputEvent): void {
    this.queue.push(event);
    this._onDidReceiveInput.fire();
  }

  public drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  /**
   * Paint the rows that changed since the previous frame.
   */
  public draw(frame: Frame): void {
    if (!this.active) {
      return;
    }
    for (let y = 0; y < frame.height; y++) {
      const row = frame.rows[y] ?? [];
      const signature = JSON.stringify(row);
      if (this.previous[y] === signature) {
        continue;
      }
      this.previous[y] = signature;
      terminal.moveTo(1, y + 1);
      terminal.eraseLine();
      for (const cell of row) {
        this.applyStyle(cell.style);
        terminal.noFormat(cell.text);
        terminal.styleReset();
      }
    }
    this.previous.length = frame.height;
  }

  private applyStyle(style: CellStyle): void {
    if (style.fg) {
      COLORS[style.fg]();
    }
    if (style.bold) {
      terminal.bold();
    }
    if (style.dim) {
      terminal.dim();
    }
    if (style.inverse) {
      terminal.inverse();
    }
  }

  /**
   * Give the terminal back: input mode, cursor, alternate screen.
   */
  public restore(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    terminal.removeListener('key', this.onKey);
    terminal.removeListener('resize', this.onResize);
    try {
      terminal.grabInput(false);
      terminal.styleReset();
      terminal.hideCursor(false);
      terminal.fullscreen(false);
    } catch (err) {
      log(`Failed to restore terminal: ${err}`, LogLevel.ERROR);
    }
  }

  public dispose(): void {
    this.restore();
    this._onDidReceiveInput.dispose();
  }
}
