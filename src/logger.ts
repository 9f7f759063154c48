import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

const levelTags: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("debug"),
  info: chalk.cyan("info"),
  warn: chalk.yellow("warn"),
  error: chalk.red.bold("error"),
};

export function createLogger(level: LogLevel): Logger {
  const threshold = levelWeights[level];

  const logAt =
    (at: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (levelWeights[at] < threshold) {
        return;
      }

      console.error(`[${levelTags[at]}] ${message}`, ...details);
    };

  return {
    debug: logAt("debug"),
    info: logAt("info"),
    warn: logAt("warn"),
    error: logAt("error"),
  };
}

export const silentLogger = createLogger("silent");
