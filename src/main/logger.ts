import fs from "fs";
import path from "path";
import os from "os";

export const APP_DIR =
  process.env.GAMEPLAY_RECORDER_HOME || path.join(os.homedir(), ".gameplay-recorder");
const LOG_FILE = path.join(APP_DIR, "app.log");
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB max log file size

type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

let logDirReady = false;

function ensureLogDir(): void {
  if (logDirReady) return;
  fs.mkdirSync(APP_DIR, { recursive: true });
  logDirReady = true;
}

/**
 * Write log message to both console and file
 */
function writeLog(level: LogLevel, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [${level}] ${message}`;

  if (level === "ERROR") {
    console.error(formattedMessage, ...args);
  } else if (level === "WARN") {
    console.warn(formattedMessage, ...args);
  } else {
    console.log(formattedMessage, ...args);
  }

  try {
    ensureLogDir();
    if (fs.existsSync(LOG_FILE)) {
      const stats = fs.statSync(LOG_FILE);
      if (stats.size > MAX_LOG_SIZE) {
        const backupFile = path.join(APP_DIR, `app.${Date.now()}.log`);
        fs.renameSync(LOG_FILE, backupFile);
      }
    }

    const logLine = formattedMessage + (args.length > 0 ? " " + JSON.stringify(args) : "") + "\n";
    fs.appendFileSync(LOG_FILE, logLine, "utf-8");
  } catch (err) {
    // Don't crash the recording loop if logging fails
    console.error(
      "[logger] Failed to write to log file:",
      err instanceof Error ? err.message : String(err)
    );
  }
}

export const logger = {
  log: (message: string, ...args: unknown[]) => writeLog("INFO", message, ...args),
  error: (message: string, ...args: unknown[]) => writeLog("ERROR", message, ...args),
  warn: (message: string, ...args: unknown[]) => writeLog("WARN", message, ...args),
  debug: (message: string, ...args: unknown[]) => writeLog("DEBUG", message, ...args),
  getLogPath: () => LOG_FILE,
};
