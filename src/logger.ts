// Debug tracing: console output prefixed with the emitting component.

const METHODS = ["log", "info", "debug", "warn", "error"] as const;

type LogMethod = (typeof METHODS)[number];

export type Trace = (message: string) => void;

/** setup a trace for a component; silent unless enabled */
export function dbg(component: string, enabled: boolean): Trace {
  if (!enabled) return () => {};
  return (message) => {
    lprintf(component, message);
  };
}

/**
 * console formatter: writes `component.message`. A leading `warn;` (or any
 * other console method name followed by `;`) picks the method, default debug.
 */
function lprintf(component: string, message: string): void {
  const [method, text] = splitMethod(message);
  console[method](`${component}.${text}`);
}

function splitMethod(message: string): [LogMethod, string] {
  const match = /^(\w+);\s*/.exec(message);
  const method = METHODS.find((m) => m === match?.[1]);
  if (match && method) {
    return [method, message.slice(match[0].length)];
  }
  return ["debug", message];
}
