// host-backend/FileLogTap.ts

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    return stripAnsi(arg.stack ?? arg.message);
  }
  try {
    return stripAnsi(JSON.stringify(arg));
  } catch {
    // Circular structures and BigInt still deserve a line.
    return stripAnsi(util.inspect(arg));
  }
}

export function formatLine(args: unknown[]): string {
  return args.map(serializeArg).join(" ");
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.apply(console, args);
  };
}

/**
 * Mirror console output into the file named by CRAWL_FILELOG (appending).
 * Returns a function that restores the original console methods and closes
 * the file, or null when no file is configured.
 */
export function installFileLogTap(filePath: string | undefined = process.env.CRAWL_FILELOG): (() => void) | null {
  if (!filePath) return null;

  const stream = fs.createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err: Error) => {
    restore();
    console.warn(`[FileLogTap] log file ${filePath} unavailable; console only`, err.message);
  });

  const writeLine = (level: string, args: unknown[]): void => {
    stream.write(`[${new Date().toISOString()}] [${level}] ${formatLine(args)}\n`);
  };

  const { log, info, warn, error } = console;

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);

  let restored = false;
  function restore(): void {
    if (restored) return;
    restored = true;
    console.log = log;
    console.info = info;
    console.warn = warn;
    console.error = error;
    stream.end();
  }

  return restore;
}
