import { dirname } from "node:path";
import chalk from "chalk";
import fs from "fs-extra";
import type { StepName } from "../runtime/types.ts";

export type LogLevel = "DEBUG" | "INFO" | "SUCCESS" | "WARNING" | "ERROR";
export type StepStatus = "start" | "ok" | "warn" | "fail" | "blocked";

export interface Logger {
  title(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Classified status line for a pipeline step. */
  step(step: StepName, status: StepStatus, detail?: string): void;
  /** Verbatim multi-line output such as a container log tail. */
  block(heading: string, text: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  logFile?: string;
}

const STEP_LABELS: Record<StepStatus, string> = {
  start: chalk.cyan("[ .. ]"),
  ok: chalk.green("[ OK ]"),
  warn: chalk.yellow("[WARN]"),
  fail: chalk.red("[FAIL]"),
  blocked: chalk.gray("[SKIP]"),
};

const STEP_LEVELS: Record<StepStatus, LogLevel> = {
  start: "INFO",
  ok: "SUCCESS",
  warn: "WARNING",
  fail: "ERROR",
  blocked: "WARNING",
};

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatLogLine(level: LogLevel, message: string, date = new Date()): string {
  return `[${formatTimestamp(date)}] [${level}] ${message}\n`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  let logFile = opts.logFile;

  const write = (level: LogLevel, message: string) => {
    if (!logFile) return;
    try {
      fs.ensureDirSync(dirname(logFile));
      fs.appendFileSync(logFile, formatLogLine(level, message), "utf8");
    } catch (e) {
      console.error(chalk.yellow(`Warning: cannot write log file ${logFile}: ${e instanceof Error ? e.message : String(e)}`));
      logFile = undefined;
    }
  };

  return {
    title(text) {
      const rule = "=".repeat(50);
      console.log(chalk.bold.cyan(rule));
      console.log(chalk.bold.cyan(` ${text}`));
      console.log(chalk.bold.cyan(rule));
      write("INFO", text);
    },
    info(message) {
      console.log(message);
      write("INFO", message);
    },
    success(message) {
      console.log(chalk.green(`✓ ${message}`));
      write("SUCCESS", message);
    },
    warn(message) {
      console.warn(chalk.yellow(`Warning: ${message}`));
      write("WARNING", message);
    },
    error(message) {
      console.error(chalk.red(`Error: ${message}`));
      write("ERROR", message);
    },
    debug(message) {
      if (opts.verbose) console.log(chalk.gray(message));
      write("DEBUG", message);
    },
    step(step, status, detail) {
      const line = detail ? `${step}  ${detail}` : step;
      const out = `${STEP_LABELS[status]} ${status === "fail" ? chalk.red(line) : line}`;
      if (status === "fail") console.error(out);
      else console.log(out);
      write(STEP_LEVELS[status], `${step}: ${status}${detail ? ` - ${detail}` : ""}`);
    },
    block(heading, text) {
      const body = text.trim();
      if (!body) return;
      console.error(chalk.gray(`\n--- ${heading} ---`));
      console.error(body);
      console.error(chalk.gray("-".repeat(heading.length + 8)));
      write("ERROR", `${heading}\n${body}`);
    },
  };
}
