/**
 * JSON-mode-aware output gate.
 *
 * Every ui/ printer goes through print() / printErr(). Once --json is set
 * the human-readable output is silenced and only printJson() reaches stdout.
 */

let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

/**
 * Write to stdout unless JSON mode is active
 */
export function print(...args: unknown[]): void {
  if (!jsonMode) {
    console.log(...args);
  }
}

/**
 * Write to stderr unless JSON mode is active
 */
export function printErr(...args: unknown[]): void {
  if (!jsonMode) {
    console.error(...args);
  }
}

/**
 * Write a machine-readable document; only emitted in JSON mode
 */
export function printJson(value: unknown): void {
  if (jsonMode) {
    console.log(JSON.stringify(value, null, 2));
  }
}
