/**
 * Converge — Logging
 *
 * Structured, leveled logging with pluggable transports and redaction.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type ProvisionLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type ProvisionLogEntry = {
  timestamp: Date;
  level: ProvisionLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  planId?: string;
  resource?: string;
  stage?: number;
};

export type LogFormatter = (entry: ProvisionLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: ProvisionLogEntry): void | Promise<void>;
  flush?(): void | Promise<void>;
  close?(): void | Promise<void>;
}

export interface ProvisionLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): ProvisionLogger;
  withContext(context: LogContext): ProvisionLogger;
  setLevel(level: ProvisionLogLevel): void;
  getLevel(): ProvisionLogLevel;
  isLevelEnabled(level: ProvisionLogLevel): boolean;
  /** Flush and close every transport. Children share their parent's transports. */
  close(): Promise<void>;
}

export type LogContext = {
  planId?: string;
  resource?: string;
  stage?: number;
};

export type LogDestination = {
  type: "console" | "file";
  path?: string;
  minLevel?: ProvisionLogLevel;
};

export type LoggingConfig = {
  level: ProvisionLogLevel;
  destinations: LogDestination[];
  redactPatterns: string[];
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<ProvisionLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: ProvisionLogLevel, minLevel: ProvisionLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<ProvisionLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: ProvisionLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.planId) contextParts.push(`plan=${entry.planId}`);
    if (entry.stage !== undefined) contextParts.push(`stage=${entry.stage}`);
    if (entry.resource) contextParts.push(`resource=${entry.resource}`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: ProvisionLogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: ProvisionLogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: ProvisionLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Appends formatted entries to a file, buffered.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: ProvisionLogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: ProvisionLogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "info";
    this.bufferSize = options.bufferSize ?? 100;
  }

  write(entry: ProvisionLogEntry): Promise<void> | void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) return this.flush();
  }

  async flush(): Promise<void> {
    if (this.buffer.length > 0) {
      const content = this.buffer.join("\n") + "\n";
      this.buffer = [];
      // Appends are chained so a flush never overtakes an earlier one.
      this.pending = this.pending.then(async () => {
        const fs = await import("node:fs/promises");
        await fs.appendFile(this.filePath, content, "utf8");
      });
    }
    await this.pending;
  }

  async close(): Promise<void> {
    await this.flush();
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class ProvisionLoggerImpl implements ProvisionLogger {
  readonly subsystem: string;
  private level: ProvisionLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: ProvisionLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): ProvisionLogger {
    return new ProvisionLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): ProvisionLogger {
    return new ProvisionLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: ProvisionLogLevel): void {
    this.level = level;
  }

  getLevel(): ProvisionLogLevel {
    return this.level;
  }

  isLevelEnabled(level: ProvisionLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    await Promise.all(
      this.transports.map(async (transport) => {
        await transport.flush?.();
        await transport.close?.();
      }),
    );
  }

  private log(level: ProvisionLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: ProvisionLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      planId: this.context.planId,
      resource: this.context.resource,
      stage: this.context.stage,
    };

    for (const transport of this.transports) {
      try {
        const pending = transport.write(entry);
        if (pending instanceof Promise) pending.catch((err: unknown) => reportTransportFailure(transport, err));
      } catch (err) {
        reportTransportFailure(transport, err);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function reportTransportFailure(transport: LogTransport, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`converge: log transport "${transport.name}" failed: ${message}`);
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createProvisionLogger(
  subsystem: string,
  config?: Partial<LoggingConfig>,
): ProvisionLogger {
  const level = config?.level ?? "info";
  const transports: LogTransport[] = (config?.destinations ?? []).map((dest) =>
    dest.type === "file"
      ? new FileTransport({ filePath: dest.path ?? "converge.log", minLevel: dest.minLevel ?? level })
      : new ConsoleTransport({ minLevel: dest.minLevel ?? level }),
  );

  if (transports.length === 0) {
    transports.push(new ConsoleTransport({ minLevel: level }));
  }

  return new ProvisionLoggerImpl({
    subsystem: `converge/${subsystem}`,
    level,
    transports,
    redactPatterns: config?.redactPatterns,
  });
}

let globalLogger: ProvisionLogger | null = null;

/**
 * Get the process default logger, or a child of it.
 */
export function getProvisionLogger(subsystem?: string): ProvisionLogger {
  if (!globalLogger) {
    globalLogger = createProvisionLogger("core");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalProvisionLogger(logger: ProvisionLogger): void {
  globalLogger = logger;
}
