/**
 * Load .env files right before a function runs.
 */

import dotenv, { type DotenvConfigOptions } from "dotenv";

export interface UsingDotenvOptions extends DotenvConfigOptions {
  /** Report what dotenv loads, or why it couldn't (maps to dotenv's `debug`). Default true */
  verbose?: boolean;
}

type Wrapped<TArgs extends unknown[], TReturn> = (...args: TArgs) => TReturn;

function wrapWithDotenv<TArgs extends unknown[], TReturn>(
  fn: Wrapped<TArgs, TReturn>,
  options: UsingDotenvOptions
): Wrapped<TArgs, TReturn> {
  const { verbose = true, override = true, ...rest } = options;
  return (...args: TArgs): TReturn => {
    dotenv.config({ debug: verbose, override, ...rest });
    return fn(...args);
  };
}

/**
 * Wrap a function so that every call loads .env first.
 *
 * Works directly, `usingDotenv(setup)`, or as a factory,
 * `usingDotenv({ path: ".env.test" })(setup)`. Existing variables are
 * overridden unless `override: false` is passed.
 */
export function usingDotenv<TArgs extends unknown[], TReturn>(
  fn: Wrapped<TArgs, TReturn>,
  options?: UsingDotenvOptions
): Wrapped<TArgs, TReturn>;
export function usingDotenv(
  options?: UsingDotenvOptions
): <TArgs extends unknown[], TReturn>(fn: Wrapped<TArgs, TReturn>) => Wrapped<TArgs, TReturn>;
export function usingDotenv(
  fnOrOptions?: Wrapped<never[], unknown> | UsingDotenvOptions,
  options: UsingDotenvOptions = {}
): unknown {
  if (typeof fnOrOptions === "function") {
    return wrapWithDotenv(fnOrOptions, options);
  }
  const factoryOptions = fnOrOptions ?? {};
  return <TArgs extends unknown[], TReturn>(fn: Wrapped<TArgs, TReturn>) =>
    wrapWithDotenv(fn, factoryOptions);
}
