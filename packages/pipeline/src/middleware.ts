import { MiddlewareChainError } from "@phaseline/errors";
import type { Middleware, NextFunction } from "./types.js";

/**
 * Onion composition around a zero-argument unit of work.
 *
 * Middleware registered first is outermost:
 *   use(a).use(b).compose(core)  →  a( b( core ) )
 *
 * Each layer may run code before and after `next()`, transform the result,
 * or short-circuit by returning without calling `next()`. Calling `next()`
 * twice from one layer rejects with MiddlewareChainError.
 *
 * @example
 * ```typescript
 * const composer = new MiddlewareComposer<string>()
 *   .use(async (next) => `[${await next()}]`);
 *
 * await composer.compose(async () => "core")(); // "[core]"
 * ```
 */
export class MiddlewareComposer<T> {
  private middleware: readonly Middleware<T>[] = [];

  /** Append a layer inside the ones already registered */
  use(middleware: Middleware<T>): this {
    this.middleware = [...this.middleware, middleware];
    return this;
  }

  get size(): number {
    return this.middleware.length;
  }

  /**
   * Wrap `core` in the layers registered so far. Later `use()` calls do not
   * affect an already composed function. The composed function can be called
   * any number of times.
   */
  compose(core: () => T | Promise<T>): NextFunction<T> {
    const layers = this.middleware;

    return () => {
      let lastIndex = -1;

      const dispatch = async (index: number): Promise<T> => {
        if (index <= lastIndex) {
          throw new MiddlewareChainError(index - 1);
        }
        lastIndex = index;

        const layer = layers[index];
        if (layer === undefined) {
          return core();
        }
        return layer(() => dispatch(index + 1));
      };

      return dispatch(0);
    };
  }
}
