/**
 * Namespaced console logger. Debug output is off unless enabled through
 * `setDebugEnabled` or the DEBUG environment variable.
 */

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warning: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

let debugEnabled = process.env.DEBUG === 'true' || process.env.DEBUG === '1';
let silenced = false;

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

// The ink interface owns the terminal; stray console output would tear it.
export function setSilenced(value: boolean): void {
  silenced = value;
}

export function createLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`;

  const boundDebug = console.debug.bind(console, prefix);
  const boundInfo = console.info.bind(console, prefix);
  const boundWarn = console.warn.bind(console, prefix);
  const boundError = console.error.bind(console, prefix);

  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled && !silenced) {
        boundDebug(...args);
      }
    },
    info: (...args: unknown[]) => {
      if (!silenced) boundInfo(...args);
    },
    warning: (...args: unknown[]) => {
      if (!silenced) boundWarn(...args);
    },
    error: (...args: unknown[]) => {
      boundError(...args);
    },
  };
}
