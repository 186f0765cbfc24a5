import chalk from "chalk";
import { appendFileSync } from "node:fs";

// Status output for the CLI. Codec results themselves go to stdout untouched
// (see emitOutput in frontend/core.ts) so they can be piped.

let logFilePath: string | null = null;

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

function logExceptInTestEnv(message: string): void {
  if (!isTestEnv()) {
    console.error(message);
  }
}

export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

export function getLogFile(): string | null {
  return logFilePath;
}

export function formatLogLine(level: string, message: string, timestamp: Date = new Date()): string {
  return `[${timestamp.toISOString()}] [${level}] ${message}\n`;
}

function writeToLog(level: string, message: string): void {
  if (!logFilePath) {
    return;
  }
  appendFileSync(logFilePath, formatLogLine(level, message), "utf-8");
}

export function success(message: string): void {
  logExceptInTestEnv(chalk.green(message));
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  logExceptInTestEnv(chalk.red(message));
  writeToLog("ERROR", message);
}

export function info(message: string): void {
  logExceptInTestEnv(chalk.blue(message));
  writeToLog("INFO", message);
}

export function dim(message: string): void {
  logExceptInTestEnv(chalk.gray(message));
  writeToLog("DEBUG", message);
}

export function h1(message: string): void {
  logExceptInTestEnv(chalk.cyanBright(message));
  writeToLog("INFO", message);
}
