/**
 * Makes sure the well-known disposal symbols exist before any handle is
 * created, so listeners, queues and channels can be released with `using`
 * blocks on hosts that predate explicit resource management.
 *
 * Every module that implements `[Symbol.dispose]` imports `Symbol` from here
 * rather than relying on the global, which guarantees the polyfill below has
 * run first.
 *
 * @example
 * ```ts
 * import { Symbol } from "./symbol.ts";
 *
 * const handle = {
 *   [Symbol.dispose]() {
 *     console.log("released");
 *   },
 * };
 * ```
 *
 * @module
 */

/**
 * Installs `Symbol[name]` as a non-writable, non-enumerable property when the
 * host does not already provide it.
 */
function ensureWellKnown(name: "dispose" | "asyncDispose"): void {
  if (typeof globalThis.Symbol !== "function") return;
  if (typeof Reflect.get(globalThis.Symbol, name) === "symbol") return;

  Reflect.defineProperty(globalThis.Symbol, name, {
    value: globalThis.Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

ensureWellKnown("dispose");
ensureWellKnown("asyncDispose");

/**
 * The global Symbol constructor, guaranteed to carry `Symbol.dispose` and
 * `Symbol.asyncDispose`.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol;
