import { EventEmitter } from "node:events";

type Listener<T> = (payload: T) => void;

/**
 * Type-safe event emitter built on node:events. Every event carries a single
 * payload object.
 *
 * ```ts
 * interface MyEvents {
 *   "process:spawned": { pid: number };
 * }
 * class MyClass extends TypedEventEmitter<MyEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
