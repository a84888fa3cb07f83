import chalk from "chalk";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

interface Logger {
  debug: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  success: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
  child: (scope: string) => ScopedLogger;
}

type ScopedLogger = Omit<Logger, "child">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const resolveLevel = (raw: string | undefined): LogLevel => {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
};

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatLine = (
  label: string,
  color: (value: string) => string,
  message: string,
  options?: LogOptions
) => {
  const timestamp = new Date().toLocaleString();
  const scope = options?.scope ? ` ${chalk.gray(`[${options.scope}]`)}` : "";
  const prefix = label.length > 0 ? ` ${color(label)}` : "";
  const data = formatData(options?.data);
  const base = `${chalk.gray(timestamp)}${prefix}${scope} ${message}`;
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${data}`;
};

const formatWarnLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  const scope = options?.scope ? ` [${options.scope}]` : "";
  const data = formatData(options?.data);
  const base = `${chalk.gray(timestamp)} ${chalk.yellowBright(
    `WARN${scope} ${message}`
  )}`;
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${chalk.yellowBright(data)}`;
};

const writeLog = (
  level: LogLevel | "success",
  message: string,
  options?: LogOptions
) => {
  const effective = level === "success" ? "info" : level;
  if (LEVEL_ORDER[effective] < LEVEL_ORDER[threshold]) {
    return;
  }
  if (level === "debug") {
    console.log(formatLine("DEBUG", chalk.cyan, chalk.dim(message), options));
    return;
  }
  if (level === "success") {
    console.log(formatLine("SUCCESS", chalk.greenBright, message, options));
    return;
  }
  if (level === "info") {
    console.log(formatLine("", chalk.white, message, options));
    return;
  }
  if (level === "warn") {
    console.warn(formatWarnLine(message, options));
    return;
  }
  console.error(formatLine("ERROR", chalk.redBright, message, options));
};

const withScope = (scope: string, options?: LogOptions): LogOptions => ({
  ...options,
  scope: options?.scope ?? scope,
});

const createScopedLogger = (scope: string): ScopedLogger => ({
  debug: (message, options) => writeLog("debug", message, withScope(scope, options)),
  info: (message, options) => writeLog("info", message, withScope(scope, options)),
  success: (message, options) =>
    writeLog("success", message, withScope(scope, options)),
  warn: (message, options) => writeLog("warn", message, withScope(scope, options)),
  error: (message, options) => writeLog("error", message, withScope(scope, options)),
});

export const logger: Logger = {
  debug: (message, options) => writeLog("debug", message, options),
  info: (message, options) => writeLog("info", message, options),
  success: (message, options) => writeLog("success", message, options),
  warn: (message, options) => writeLog("warn", message, options),
  error: (message, options) => writeLog("error", message, options),
  child: createScopedLogger,
};

export { setLogLevel };
export type { LogLevel, LogOptions, ScopedLogger };
