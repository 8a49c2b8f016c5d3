/**
 * Typed EventEmitter
 * Event names map to the tuple of arguments their listeners receive
 */

import { EventEmitter } from 'events';

/**
 * Usage:
 * ```typescript
 * interface RegistryEvents {
 *   'session:added': [session: Session];
 *   'session:removed': [port: number, processId: number];
 * }
 *
 * class SessionRegistry extends TypedEventEmitter<RegistryEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends Record<string, unknown[]>> extends EventEmitter {
  on<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  emit<K extends keyof TEvents & string>(event: K, ...args: TEvents[K]): boolean {
    return super.emit(event, ...args);
  }
}
