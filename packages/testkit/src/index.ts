/**
 * Test helpers shared across workspaces
 */

export { FakeCouchTransport, matchesSelector, NO_INDEX_WARNING } from "./fake-couch.js";
export type { FakeCouchOptions } from "./fake-couch.js";
export { captureOutput } from "./cli.js";
export type { OutputCapture } from "./cli.js";
