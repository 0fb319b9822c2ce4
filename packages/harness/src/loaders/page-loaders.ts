/**
 * Page loaders: bring the browser to an expected state (page opened, user
 * signed in, several steps chained) before test assertions run.
 */

import { z } from "zod";
import { readLoginPassword, readLoginUser } from "../config/login.js";
import type { EnvSource } from "../config/helpers.js";
import { createLogger } from "../utils/logger.js";
import { isIterable, isRecord } from "../utils/type-guards.js";

const log = createLogger("LOADER");

/**
 * The slice of a browser driver the loaders use. A selenium-webdriver
 * `WebDriver` or any object with an async `get(url)` fits.
 */
export interface BrowserDriver {
  get(url: string): Promise<void>;
}

export function isBrowserDriver(value: unknown): value is BrowserDriver {
  return isRecord(value) && typeof value.get === "function";
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export class LoaderConfigError extends Error {
  constructor(
    public readonly loader: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(`Invalid ${loader} options: ${formatIssues(issues)}`);
    this.name = "LoaderConfigError";
  }
}

const BrowserDriverSchema = z.custom<BrowserDriver>(isBrowserDriver, {
  message: "Expected a browser driver with a get(url) method",
});

const BaseLoaderSchema = z.object({
  browser: BrowserDriverSchema,
  url: z.string().nullable(),
});

function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, loader: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new LoaderConfigError(loader, result.error.issues);
  }
  return result.data;
}

export interface PageLoaderOptions {
  browser: BrowserDriver;
  url?: string | null;
}

/** Base class for all page loaders. */
export abstract class BasePageLoader {
  readonly browser: BrowserDriver;
  readonly url: string | null;

  protected constructor(options: PageLoaderOptions) {
    const parsed = parseOptions(
      BaseLoaderSchema,
      { browser: options.browser, url: options.url ?? null },
      new.target.name
    );
    this.browser = parsed.browser;
    this.url = parsed.url;
  }

  abstract load(): Promise<void>;

  /** Open this loader's URL, if it has one */
  protected async navigate(): Promise<void> {
    if (this.url === null) {
      return;
    }
    log.debug(`${this.constructor.name}: opening ${this.url}`);
    await this.browser.get(this.url);
  }
}

/** Regular page loader. Used most of the time. */
export class PageLoader extends BasePageLoader {
  constructor(options: PageLoaderOptions) {
    super(options);
  }

  async load(): Promise<void> {
    await this.navigate();
  }
}

export interface LoginCredentials {
  loginName: string | null;
  loginPassword: string | null;
}

/** Fills in and submits the login form once the page is open */
export type SignIn = (browser: BrowserDriver, credentials: LoginCredentials) => Promise<void>;

export interface LoginerOptions extends PageLoaderOptions {
  signIn: SignIn;
  /** Defaults to LOGIN_USER */
  loginName?: string | null;
  /** Defaults to LOGIN_PASSWORD */
  loginPassword?: string | null;
  /** Where the defaults are read from (process.env by default) */
  env?: EnvSource;
}

const LoginerSchema = z.object({
  loginName: z.string().nullable(),
  loginPassword: z.string().nullable(),
  signIn: z.custom<SignIn>((value) => typeof value === "function", {
    message: "Expected a signIn function",
  }),
});

/** Special loader which ensures a user is logged in. */
export class Loginer extends BasePageLoader {
  readonly loginName: string | null;
  readonly loginPassword: string | null;
  private readonly signIn: SignIn;

  constructor(options: LoginerOptions) {
    super(options);
    const env = options.env ?? process.env;
    const parsed = parseOptions(
      LoginerSchema,
      {
        loginName: options.loginName === undefined ? readLoginUser(env) : options.loginName,
        loginPassword: options.loginPassword === undefined ? readLoginPassword(env) : options.loginPassword,
        signIn: options.signIn,
      },
      "Loginer"
    );
    this.loginName = parsed.loginName;
    this.loginPassword = parsed.loginPassword;
    this.signIn = parsed.signIn;
  }

  get credentials(): LoginCredentials {
    return { loginName: this.loginName, loginPassword: this.loginPassword };
  }

  async load(): Promise<void> {
    await this.navigate();
    log.info(`Signing in as ${this.loginName ?? "(no user)"}`);
    await this.signIn(this.browser, this.credentials);
  }
}

/**
 * Normalize the `loaders` option: a single loader (or a string, which must
 * not be split into characters) becomes a one-item list, any other iterable
 * is spread, and anything else is wrapped so validation can report it.
 */
export function toLoaderSequence(value: unknown): unknown[] {
  if (value instanceof BasePageLoader || typeof value === "string") {
    return [value];
  }
  if (isIterable(value)) {
    return Array.from(value);
  }
  return [value];
}

const LoaderListSchema = z
  .array(
    z.custom<BasePageLoader>((value) => value instanceof BasePageLoader, {
      message: "Expected a page loader",
    })
  )
  .min(1, { message: "At least one loader is required" });

export interface SequenceLoaderOptions extends PageLoaderOptions {
  loaders: BasePageLoader | Iterable<BasePageLoader>;
}

/** A loader which executes multiple other loaders in a sequence. */
export class SequenceLoader extends BasePageLoader {
  readonly loaders: readonly BasePageLoader[];

  constructor(options: SequenceLoaderOptions) {
    super(options);
    this.loaders = Object.freeze(
      parseOptions(LoaderListSchema, toLoaderSequence(options.loaders), "SequenceLoader")
    );
  }

  async load(): Promise<void> {
    await this.navigate();
    for (const loader of this.loaders) {
      await loader.load();
    }
  }
}
