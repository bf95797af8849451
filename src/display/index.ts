/**
 * Virtual display module.
 * Starts, watches and stops the Xvfb server the browser draws on.
 */

export { VirtualDisplaySupervisor } from './supervisor.js';
export type {
  DisplayHandle,
  DisplayState,
  DisplaySupervisor,
  ScreenGeometry,
  SupervisorOptions,
} from './supervisor.js';
export { x11SocketProbe, ensureSocketDir, formatDisplay, parseDisplay } from './readiness.js';
export type { ReadinessProbe } from './readiness.js';
