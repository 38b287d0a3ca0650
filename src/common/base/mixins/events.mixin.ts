import { EventEmitter } from "events";
import type { AbstractConstructor, IBaseService } from "../../types/services";
import { toError } from "../../utils/error.utils";

export type EventMap = Record<string, unknown[]>;

/**
 * Typed event handling capabilities
 */
export interface EventCapabilities<TEvents extends EventMap> {
  emit<K extends keyof TEvents & string>(event: K, ...args: TEvents[K]): boolean;
  on<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this;
  once<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this;
  off<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this;
  removeAllListeners(event?: keyof TEvents & string): this;
  listenerCount(event: keyof TEvents & string): number;
}

/**
 * Mixin that adds a typed EventEmitter facade to a service
 */
export function WithEvents<TEvents extends EventMap>() {
  return function <TBase extends AbstractConstructor<IBaseService>>(Base: TBase) {
    abstract class EventsMixin extends Base implements EventCapabilities<TEvents> {
      public readonly eventEmitter = new EventEmitter();

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.eventEmitter.setMaxListeners(20);
      }

      emit<K extends keyof TEvents & string>(event: K, ...args: TEvents[K]): boolean {
        try {
          return this.eventEmitter.emit(event, ...args);
        } catch (error) {
          // listener failures stay with the listener
          this.logError(toError(error), `listener:${event}`);
          return true;
        }
      }

      on<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
        this.eventEmitter.on(event, listener);
        if (this.eventEmitter.listenerCount(event) > this.eventEmitter.getMaxListeners()) {
          this.logWarning(`Max listeners exceeded for event: ${event}`, "EventEmitter");
        }
        return this;
      }

      once<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
        this.eventEmitter.once(event, listener);
        return this;
      }

      off<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
        this.eventEmitter.off(event, listener);
        return this;
      }

      removeAllListeners(event?: keyof TEvents & string): this {
        this.eventEmitter.removeAllListeners(event);
        return this;
      }

      listenerCount(event: keyof TEvents & string): number {
        return this.eventEmitter.listenerCount(event);
      }
    }

    return EventsMixin;
  };
}
