export * from './errors/index.js';
export * from './utils/index.js';

export { AuthorizationCoordinator } from './implementations/authorization-coordinator.js';
export type { AuthorizationCoordinatorDeps } from './implementations/authorization-coordinator.js';
export {
  OneShotRedirectListener,
  createRedirectApp,
} from './implementations/redirect-listener.js';
export type {
  IRedirectListener,
  OneShotRedirectListenerOptions,
  RedirectAppOptions,
  RedirectResult,
} from './implementations/redirect-listener.js';
export {
  SystemBrowserLauncher,
  ManualBrowserLauncher,
} from './implementations/browser-launcher.js';
export type { IBrowserLauncher } from './implementations/browser-launcher.js';
