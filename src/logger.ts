import { existsSync, mkdirSync } from "fs";
import path from "path";
import winston from "winston";

const LOG_DIR = process.env.LOG_DIR || "";
const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const SILENT = LOG_LEVEL === "silent";

if (LOG_DIR && !existsSync(LOG_DIR)) {
  try { mkdirSync(LOG_DIR, { recursive: true }); }
  catch (e) { console.warn(`[logger] Could not create log dir "${LOG_DIR}": ${e instanceof Error ? e.message : String(e)}`); }
}

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp, module: mod, stack }) => {
    const tag = mod ? ` [${mod}]` : "";
    if (stack) return `${timestamp} ${level}:${tag} ${message}\n${stack}`;
    return `${timestamp} ${level}:${tag} ${message}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.uncolorize(),
  winston.format.json()
);

// Console goes to stderr so generated codes on stdout stay pipeable
const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat, stderrLevels: ["error", "warn", "info", "debug"] }),
];

if (LOG_DIR) {
  transports.push(
    new winston.transports.File({
      filename: path.join(LOG_DIR, "error.log"),
      level: "error",
      format: fileFormat,
      maxsize: 5 * 1024 * 1024,  // 5 MB
      maxFiles: 3,
    }),
    new winston.transports.File({
      filename: path.join(LOG_DIR, "combined.log"),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: SILENT ? "error" : LOG_LEVEL,
  silent: SILENT,
  format: winston.format.combine(
    winston.format.timestamp({ format: "HH:mm:ss" }),
    winston.format.errors({ stack: true }),
  ),
  transports,
});

export default logger;
