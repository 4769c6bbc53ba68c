import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import process from "node:process";
import { APP_NAME } from "./config.js";
import type { LogSink } from "./utils/logger.js";

type NotificationLevel = "emergency" | "alert" | "critical" | "error" | "warning" | "notice" | "info" | "debug";
type WriteCallback = (error?: Error | null) => void;

interface LogNotification {
  jsonrpc: "2.0";
  method: "notifications/message";
  params: {
    level: NotificationLevel;
    logger?: string;
    data: unknown;
  };
}

/**
 * Console arguments as notification data: a single object goes through
 * as structured data, anything else is joined into one string.
 */
export function formatConsoleArgs(args: unknown[]): unknown {
  if (args.length === 1 && typeof args[0] === "object" && args[0] !== null) {
    return args[0];
  }
  return args.map((arg) => {
    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg, null, 2);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  }).join(" ");
}

export function looksLikeJsonRpc(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.startsWith("{") && (
    trimmed.includes('"jsonrpc"') ||
    trimmed.includes('"method"') ||
    trimmed.includes('"id"')
  );
}

/**
 * StdioServerTransport that keeps stdout clean for the protocol: console
 * output and stray writes are wrapped into JSON-RPC log notifications once
 * the client is ready, and go to stderr before that.
 */
export class FilteredStdioServerTransport extends StdioServerTransport implements LogSink {
  private readonly originalConsole = {
    log: console.log,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
    info: console.info,
  };
  private readonly originalStdoutWrite = process.stdout.write;
  private isInitialized = false;

  constructor() {
    super();
    this.setupConsoleRedirection();
    this.setupStdoutFiltering();
    process.stderr.write(`[${APP_NAME}] FilteredStdioServerTransport initialized\n`);
  }

  /**
   * Call after MCP initialization completes to start sending notifications
   */
  public enableNotifications(): void {
    this.isInitialized = true;
    process.stderr.write(`[${APP_NAME}] JSON-RPC notifications enabled\n`);
  }

  public get isNotificationsEnabled(): boolean {
    return this.isInitialized;
  }

  private writeRaw(chunk: string | Uint8Array, encoding?: BufferEncoding, callback?: WriteCallback): boolean {
    return this.originalStdoutWrite.call(process.stdout, chunk, encoding, callback);
  }

  private redirect(level: NotificationLevel, prefix: string) {
    return (...args: unknown[]): void => {
      if (this.isInitialized) {
        this.sendLogNotification(level, args);
      } else {
        process.stderr.write(`[${prefix}] ${args.map(String).join(' ')}\n`);
      }
    };
  }

  private setupConsoleRedirection(): void {
    console.log = this.redirect("info", "LOG");
    console.info = this.redirect("info", "INFO");
    console.warn = this.redirect("warning", "WARN");
    console.error = this.redirect("error", "ERROR");
    console.debug = this.redirect("debug", "DEBUG");
  }

  private setupStdoutFiltering(): void {
    process.stdout.write = (
      chunk: string | Uint8Array,
      encodingOrCallback?: BufferEncoding | WriteCallback,
      callback?: WriteCallback,
    ): boolean => {
      const encoding = typeof encodingOrCallback === "function" ? undefined : encodingOrCallback;
      const done = typeof encodingOrCallback === "function" ? encodingOrCallback : callback;

      if (typeof chunk === "string" && !looksLikeJsonRpc(chunk) && chunk.trim().length > 0) {
        if (this.isInitialized) {
          this.sendLogNotification("info", [chunk.replace(/\n$/, '')]);
        } else {
          process.stderr.write(`[STDOUT] ${chunk}`);
        }
        if (done) done();
        return true;
      }
      return this.writeRaw(chunk, encoding, done);
    };
  }

  private sendNotification(notification: LogNotification): void {
    this.writeRaw(JSON.stringify(notification) + '\n');
  }

  private sendLogNotification(level: NotificationLevel, args: unknown[]): void {
    try {
      this.sendNotification({
        jsonrpc: "2.0",
        method: "notifications/message",
        params: { level, logger: APP_NAME, data: formatConsoleArgs(args) },
      });
    } catch {
      process.stderr.write(`[${level.toUpperCase()}] ${args.map(String).join(' ')}\n`);
    }
  }

  /**
   * Send a log notification from anywhere in the application
   */
  public sendLog(level: NotificationLevel, message: string, data?: Record<string, unknown>): void {
    try {
      this.sendNotification({
        jsonrpc: "2.0",
        method: "notifications/message",
        params: { level, logger: APP_NAME, data: data ? { message, ...data } : message },
      });
    } catch {
      process.stderr.write(`[${level.toUpperCase()}] ${message}\n`);
    }
  }

  /**
   * Restore the original console methods and stdout
   */
  public cleanup(): void {
    console.log = this.originalConsole.log;
    console.warn = this.originalConsole.warn;
    console.error = this.originalConsole.error;
    console.debug = this.originalConsole.debug;
    console.info = this.originalConsole.info;
    process.stdout.write = this.originalStdoutWrite;
  }
}
