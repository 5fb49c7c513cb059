export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

function write(target: NodeJS.WriteStream, args: unknown[]): void {
  try {
    target.write(args.map(a => String(a)).join(' ') + '\n');
  } catch {
    // a closed stdio pipe must not take the caller down
  }
}

export function debug(debugMode: boolean, ...args: unknown[]): void {
  if (debugMode) {
    write(process.stdout, args);
  }
}

export function error(...args: unknown[]): void {
  write(process.stderr, args);
}

export function warn(...args: unknown[]): void {
  write(process.stderr, args);
}

export function info(...args: unknown[]): void {
  write(process.stdout, args);
}

export function createLogger(debugMode: boolean | string = false): Logger {
  const isDebugEnabled = typeof debugMode === 'string' ? debugMode === 'true' : Boolean(debugMode);

  return {
    debug: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    log: (...args: unknown[]) => debug(isDebugEnabled, ...args),
    error,
    warn,
    info,
  };
}
