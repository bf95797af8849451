/**
 * Browser module.
 * The only module that talks to playwright-core.
 */

export { probeBrowser, bundledChromiumPath } from './probe.js';
export type { BrowserProbe, BrowserProbeOptions } from './probe.js';
