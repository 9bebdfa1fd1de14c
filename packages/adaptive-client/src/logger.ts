export type LogFields = Record<string, unknown>;

export type Logger = {
  debug(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
};

function isTruthy(val: string | undefined): boolean {
  return val === "1" || val === "true" || val === "yes";
}

function format(scope: string, message: string, fields?: LogFields): string {
  const tail = fields && Object.keys(fields).length ? ` ${JSON.stringify(fields)}` : "";
  return `[${scope}] ${message}${tail}`;
}

/** Console logger; debug lines only when `debug` is on. */
export function consoleLogger(scope: string, debug: boolean): Logger {
  return {
    debug(message, fields) {
      if (debug) console.debug(format(scope, message, fields));
    },
    warn(message, fields) {
      console.warn(format(scope, message, fields));
    },
  };
}

export function loggerFromEnv(scope: string, env: NodeJS.ProcessEnv, debugEnv: string): Logger {
  return consoleLogger(scope, isTruthy(env[debugEnv]));
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
