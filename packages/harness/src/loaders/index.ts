export {
  BasePageLoader,
  PageLoader,
  Loginer,
  SequenceLoader,
  LoaderConfigError,
  isBrowserDriver,
  toLoaderSequence,
} from "./page-loaders.js";
export type {
  BrowserDriver,
  PageLoaderOptions,
  LoginerOptions,
  LoginCredentials,
  SignIn,
  SequenceLoaderOptions,
} from "./page-loaders.js";
