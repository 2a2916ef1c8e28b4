import type { Screen } from '../../src/dashboard';
import type { Frame } from '../../src/ui/frame';
import type { InputEvent } from '../../src/ui/keymap';
import type { ScreenSize } from '../../src/ui/viewState';
import { Emitter } from '../../src/utils/emitter';

/**
 * Records drawn frames and replays scripted key presses.
 */
export class FakeScreen implements Screen {
  private _onDidReceiveInput = new Emitter<void>();
  readonly onDidReceiveInput = this._onDidReceiveInput.event;

  public readonly frames: Frame[] = [];
  public opened = false;
  private queue: InputEvent[] = [];

  constructor(private readonly dimensions: ScreenSize = { width: 120, height: 20 }) {}

  public size(): ScreenSize {
    return this.dimensions;
  }

  public open(): void {
    this.opened = true;
  }

  public restore(): void {
    this.opened = false;
  }

  public press(...keys: string[]): void {
    for (const key of keys) {
      this.queue.push({ type: 'key', key });
    }
    this._onDidReceiveInput.fire();
  }

  public drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  public draw(frame: Frame): void {
    this.frames.push(frame);
  }

  public get lastFrame(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }

  public dispose(): void {
    this.restore();
    this._onDidReceiveInput.dispose();
  }
}
