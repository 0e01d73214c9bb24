/**
 * Lightweight namespaced debug logger.
 * Usage:
 *   import { debug } from "../services/log.js";
 *   const log = debug("comment-query:compiler");
 *   log("compiled", { dimensions: 3, size: 10 });
 *
 * Enable with environment variable:
 *   DEBUG=comment-query:*          // all namespaces of this package
 *   DEBUG=comment-query:compiler   // only the compiler
 *   DEBUG=*                        // everything
 *   DEBUG=comment-query:compiler,comment-query:bootstrap // multiple
 */
export type Logger = (...args: unknown[]) => void;

function parsePatterns(s: string | undefined): string[] {
  return (s || "")
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

function matches(ns: string, pattern: string): boolean {
  if (pattern === "*" || pattern === ns) return true;
  if (pattern.endsWith("*")) {
    return ns.startsWith(pattern.slice(0, -1));
  }
  return false;
}

export function debug(namespace: string): Logger {
  const patterns = parsePatterns(process.env.DEBUG);
  const enabled = patterns.length > 0 && patterns.some((p) => matches(namespace, p));
  if (!enabled) {
    // eslint-disable-next-line @typescript-eslint/no-empty-function
    return () => {};
  }
  return (...args: unknown[]) => {
    const ts = new Date().toISOString();
    // stderr keeps stdout free for the MCP stdio transport
    // eslint-disable-next-line no-console
    console.error(`[${ts}] ${namespace}`, ...args);
  };
}
