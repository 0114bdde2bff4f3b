import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

function isLevel(s: string): s is keyof typeof ORDER {
  return Object.prototype.hasOwnProperty.call(ORDER, s);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevel(raw) ? ORDER[raw] : ORDER.info;
}

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (ORDER[level] < threshold()) return;
    const line = `${chalk.gray(new Date().toISOString())} - ${COLOR[level](level.toUpperCase())} - [${scope}] ${message}`;
    if (level === "error" || level === "warn") console.error(line);
    else console.log(line);
  };

  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}
