/**
 * webdriver-harness
 *
 * Vector settings parsed from the environment, their validators, and page
 * loaders for browser test setups.
 */

export * from "./vector/index.js";
export * from "./config/index.js";
export * from "./loaders/index.js";
export { BrowserSettings, type BrowserSettingsInit } from "./settings.js";
export { usingDotenv, type UsingDotenvOptions } from "./dotenv.js";
export { createLogger, getErrorMessage, type Logger } from "./utils/index.js";
