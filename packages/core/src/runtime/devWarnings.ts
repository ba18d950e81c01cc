/**
 * packages/core/src/runtime/devWarnings.ts — Development-mode warnings.
 *
 * Why: Layout problems (content overflowing the size it was built for, a
 * root larger than the window) are not errors, but they are worth one
 * console line while developing. Each key warns once per warner.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export type WarnFn = (message: string) => void;

export type DevWarningOptions = Readonly<{
  /** Overrides NODE_ENV detection. */
  devMode?: boolean;
  /** Defaults to console.warn. */
  warn?: WarnFn;
}>;

export type DevWarner = Readonly<{
  /** Emit `[ply-ui][area] detail` once for `key`. */
  warnOnce: (area: string, key: string, detail: string) => void;
  readonly enabled: boolean;
}>;

function consoleWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function createDevWarner(options: DevWarningOptions = {}): DevWarner {
  const enabled = options.devMode ?? DEV_MODE;
  const warn = options.warn ?? consoleWarn;
  const warned = new Set<string>();

  return Object.freeze({
    enabled,
    warnOnce(area: string, key: string, detail: string): void {
      if (!enabled) return;
      const dedupeKey = `${area}:${key}`;
      if (warned.has(dedupeKey)) return;
      warned.add(dedupeKey);
      warn(`[ply-ui][${area}] ${detail}`);
    },
  });
}
