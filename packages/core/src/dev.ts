/**
 * packages/core/src/dev.ts — Development-only diagnostics.
 *
 * Warnings are emitted only when NODE_ENV is not "production" and a console
 * is reachable through globalThis; core never imports node built-ins.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export function warnDev(area: string, message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(`[flexweave][${area}] ${message}`);
}
