// Copyright 2018-2024 the oak authors. All rights reserved.

import pino from "pino";

/**
 * The logger of a module. Records are written to the sinks of the most
 * recent {@linkcode configure} call, including by loggers obtained before it.
 */
export interface Logger {
  readonly level: string;
  readonly debug: pino.LogFn;
  readonly info: pino.LogFn;
  readonly warn: pino.LogFn;
  readonly error: pino.LogFn;
}

export type LevelName = pino.Level;

/**
 * Options which can be set when configuring file logging on the logger.
 */
export interface FileLoggerOptions {
  /**
   * The log level to log at. The default is `"info"`.
   */
  level?: LevelName;
  /**
   * The path to the log file. Missing directories are created.
   */
  filename: string;
}

/**
 * Options which can be set when configuring the logger when creating a new
 * router.
 */
export interface LoggerOptions {
  /**
   * Log events to the console. If `true`, log at the `"info"` level. If an
   * object, the `level` can be specified.
   */
  console?: boolean | { level: LevelName };
  /**
   * Log events to a file. The value should be an object with the `filename`
   * of the log file and optionally the `level` to log at.
   */
  file?: FileLoggerOptions;
  /**
   * Log events to a stream. The value should be an object with the `stream` to
   * write the log events to and optionally the `level` to log at. If `level`
   * is not specified, the default is `"info"`.
   */
  stream?: { level?: LevelName; stream: pino.DestinationStream };
}

const mods = [
  "arbor.endpoint",
  "arbor.request",
  "arbor.route_loader",
  "arbor.route_table",
  "arbor.router",
  "arbor.schema",
  "arbor.server",
] as const;

type Loggers = typeof mods[number];

let root: pino.Logger = pino({ level: "silent" });
const children = new Map<Loggers, pino.Logger>();

function current(mod: Loggers): pino.Logger {
  let child = children.get(mod);
  if (!child) {
    child = root.child({ name: mod });
    children.set(mod, child);
  }
  return child;
}

class ModuleLogger implements Logger {
  #mod: Loggers;

  get level(): string {
    return current(this.#mod).level;
  }

  get debug(): pino.LogFn {
    const logger = current(this.#mod);
    return logger.debug.bind(logger);
  }

  get info(): pino.LogFn {
    const logger = current(this.#mod);
    return logger.info.bind(logger);
  }

  get warn(): pino.LogFn {
    const logger = current(this.#mod);
    return logger.warn.bind(logger);
  }

  get error(): pino.LogFn {
    const logger = current(this.#mod);
    return logger.error.bind(logger);
  }

  constructor(mod: Loggers) {
    this.#mod = mod;
  }
}

export function getLogger(mod: Loggers): Logger {
  return new ModuleLogger(mod);
}

export function configure(options?: LoggerOptions): void {
  children.clear();
  const streams: pino.StreamEntry[] = [];
  if (options) {
    if (options.console) {
      streams.push({
        level: typeof options.console === "object"
          ? options.console.level
          : "info",
        stream: pino.destination(1),
      });
    }
    if (options.file) {
      const { filename, level = "info" } = options.file;
      streams.push({
        level,
        stream: pino.destination({ dest: filename, mkdir: true, sync: false }),
      });
    }
    if (options.stream) {
      streams.push({
        level: options.stream.level ?? "info",
        stream: options.stream.stream,
      });
    }
  } else {
    streams.push({ level: "warn", stream: pino.destination(1) });
  }
  if (!streams.length) {
    root = pino({ level: "silent" });
    return;
  }
  const level = streams
    .map((entry) => entry.level ?? "info")
    .reduce((lowest, current) =>
      pino.levels.values[current] < pino.levels.values[lowest]
        ? current
        : lowest
    );
  root = pino(
    { level, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(streams),
  );
}
