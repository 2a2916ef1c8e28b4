// src/utils/emitter.ts
import { EventEmitter } from 'events';

export interface Disposable {
  dispose(): void;
}

export type Event<T> = (listener: (value: T) => void) => Disposable;

/**
 * Typed single-channel emitter with the `event` / `fire` / `dispose` shape
 * the services use to publish changes.
 */
export class Emitter<T> implements Disposable {
  private readonly emitter = new EventEmitter();
  private disposed = false;

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  public readonly event: Event<T> = listener => {
    if (this.disposed) {
      return { dispose: () => undefined };
    }
    this.emitter.on('fire', listener);
    return {
      dispose: () => {
        this.emitter.off('fire', listener);
      }
    };
  };

  public fire(value: T): void {
    if (!this.disposed) {
      this.emitter.emit('fire', value);
    }
  }

  public dispose(): void {
    this.disposed = true;
    this.emitter.removeAllListeners();
  }
}
