import { LoggerManager } from '../utils/logging';

/**
 * Function returned by `on`, removes the handler it was created for
 */
export type UnsubscribeFn = () => void;

/**
 * Map of event name to handler signature
 */
export type EventHandlerMap<H> = { [K in keyof H]: (...args: never[]) => void };

/**
 * Typed event hub shared by nodes and evaluators.
 * Supports multiple handlers per event; a failing handler is logged and
 * never interrupts the emitter.
 */
export class HookManager<H extends EventHandlerMap<H>> {
  private readonly handlers = new Map<keyof H, Set<H[keyof H]>>();

  /**
   * Registers handler for specified event
   * @param eventType Event type
   * @param handler Event handler
   * @returns Function to cancel registration
   */
  public on<K extends keyof H>(eventType: K, handler: H[K]): UnsubscribeFn {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }

    handlers.add(handler);

    const registered = handlers;
    return () => {
      registered.delete(handler);
    };
  }

  /**
   * Calls all handlers for specified event
   * @param eventType Event type
   * @param args Arguments to pass to handlers
   */
  public emit<K extends keyof H>(eventType: K, ...args: Parameters<H[K]>): void {
    const handlers = this.handlers.get(eventType);

    if (!handlers || handlers.size === 0) {
      return;
    }

    // Snapshot, handlers may unsubscribe while being called
    [...handlers].forEach(handler => {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        LoggerManager.error(
          `Error in event handler ${String(eventType)}: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        );
      }
    });
  }

  /**
   * Cancels all subscriptions to specified event
   */
  public clearEvent(eventType: keyof H): void {
    this.handlers.get(eventType)?.clear();
  }

  /**
   * Cancels all subscriptions to all events
   */
  public clearAllEvents(): void {
    this.handlers.forEach(handlers => handlers.clear());
  }

  /**
   * Checks if there are handlers for specified event
   */
  public hasHandlers(eventType: keyof H): boolean {
    const handlers = this.handlers.get(eventType);
    return !!handlers && handlers.size > 0;
  }
}
