/**
 * Cloud Audit Core - Logging and Performance Tracking
 *
 * Provides:
 * - Structured logging with levels
 * - Credential and PII redaction
 * - Per-operation performance metrics
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SECURITY = 'SECURITY',
  CRITICAL = 'CRITICAL',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SECURITY,
  LogLevel.CRITICAL,
];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  operation?: string;
}

export interface PerformanceMetrics {
  operation: string;
  startTime: number;
  endTime?: number;
  duration?: number;
  success: boolean;
  apiCalls: number;
}

/**
 * PII patterns to redact from logs
 */
const PII_PATTERNS = [
  // AWS Access Keys (long-term and temporary)
  { pattern: /((?:AKIA|ASIA)[0-9A-Z]{16})/g, replacement: 'AKIA***REDACTED***' },
  // AWS Secret Keys
  { pattern: /([A-Za-z0-9/+=]{40})/g, replacement: '***SECRET_REDACTED***' },
  // Email addresses
  { pattern: /([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/g, replacement: '***EMAIL_REDACTED***' },
  // AWS Account IDs (12 digits)
  { pattern: /\b\d{12}\b/g, replacement: '***ACCOUNT_REDACTED***' },
  // Session tokens
  { pattern: /(FwoG[A-Za-z0-9+/=]{100,})/g, replacement: '***SESSION_TOKEN_REDACTED***' },
];

/**
 * Sensitive field names to redact (compared lower-cased)
 */
const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'accesskey',
  'accesskeyid',
  'secretkey',
  'secretaccesskey',
  'sessiontoken',
  'authtoken',
  'apikey',
  'privatekey',
  'credential',
  'credentials',
  'externalid',
]);

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const upper = value.trim().toUpperCase();
  return LEVEL_ORDER.find(level => level === upper) ?? fallback;
}

export class Logger {
  private minLevel: LogLevel;
  private logs: LogEntry[] = [];
  private maxLogs: number = 1000;
  private enableConsole: boolean;

  constructor(minLevel: LogLevel = LogLevel.INFO, enableConsole: boolean = true) {
    this.minLevel = minLevel;
    this.enableConsole = enableConsole;
  }

  private redactString(value: string): string {
    let redacted = value;
    for (const { pattern, replacement } of PII_PATTERNS) {
      redacted = redacted.replace(pattern, replacement);
    }
    return redacted;
  }

  /**
   * Redact PII from log data
   */
  private redactPII(data: unknown): unknown {
    if (typeof data === 'string') {
      return this.redactString(data);
    }

    if (Array.isArray(data)) {
      return data.map(item => this.redactPII(item));
    }

    if (data instanceof Date) {
      return data.toISOString();
    }

    if (data && typeof data === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(data)) {
        if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
          redacted[key] = '***REDACTED***';
        } else {
          redacted[key] = this.redactPII(value);
        }
      }
      return redacted;
    }

    return data;
  }

  private redactData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      redacted[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '***REDACTED***' : this.redactPII(value);
    }
    return redacted;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactString(message),
      data: data ? this.redactData(data) : undefined,
      operation,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    // stderr only: stdout carries the MCP protocol
    if (this.enableConsole && process.env.NODE_ENV !== 'production') {
      const prefix = `[${entry.timestamp}] [${level}]${operation ? ` [${operation}]` : ''}`;
      console.error(`${prefix} ${entry.message}`);
      if (entry.data) {
        console.error(JSON.stringify(entry.data, null, 2));
      }
    }
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation);
  }

  security(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.SECURITY, message, data, operation);
  }

  critical(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.CRITICAL, message, data, operation);
  }

  /**
   * Get recent logs
   */
  getLogs(level?: LogLevel, limit?: number): LogEntry[] {
    let filtered = level
      ? this.logs.filter(log => log.level === level)
      : this.logs;

    if (limit) {
      filtered = filtered.slice(-limit);
    }

    return filtered;
  }

  clearLogs(): void {
    this.logs = [];
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

/**
 * Performance tracker for collection rounds and tool calls
 */
export class PerformanceTracker {
  private metrics: Map<string, PerformanceMetrics> = new Map();
  private maxMetrics: number = 500;
  private sequence = 0;

  start(operation: string): string {
    this.sequence += 1;
    const id = `${operation}-${Date.now()}-${this.sequence}`;

    this.metrics.set(id, {
      operation,
      startTime: Date.now(),
      success: false,
      apiCalls: 0,
    });

    if (this.metrics.size > this.maxMetrics) {
      const oldestKey = this.metrics.keys().next().value;
      if (oldestKey) {
        this.metrics.delete(oldestKey);
      }
    }

    return id;
  }

  end(id: string, success: boolean = true): PerformanceMetrics | null {
    const metric = this.metrics.get(id);
    if (!metric) return null;

    metric.endTime = Date.now();
    metric.duration = metric.endTime - metric.startTime;
    metric.success = success;

    logger.info(
      `Performance: ${metric.operation} completed in ${metric.duration}ms`,
      {
        duration: metric.duration,
        success,
        apiCalls: metric.apiCalls,
      },
      metric.operation
    );

    return metric;
  }

  recordAPICall(id: string): void {
    const metric = this.metrics.get(id);
    if (metric) {
      metric.apiCalls += 1;
    }
  }

  getSummary(): {
    totalOperations: number;
    successRate: number;
    averageDuration: number;
    slowestOperation: PerformanceMetrics | null;
  } {
    const completed = Array.from(this.metrics.values()).filter(m => m.endTime !== undefined);

    if (completed.length === 0) {
      return {
        totalOperations: 0,
        successRate: 0,
        averageDuration: 0,
        slowestOperation: null,
      };
    }

    const successful = completed.filter(m => m.success).length;
    const totalDuration = completed.reduce((sum, m) => sum + (m.duration ?? 0), 0);
    const slowest = completed.reduce((max, m) =>
      (m.duration ?? 0) > (max.duration ?? 0) ? m : max
    );

    return {
      totalOperations: completed.length,
      successRate: successful / completed.length,
      averageDuration: totalDuration / completed.length,
      slowestOperation: slowest,
    };
  }

  getOperationMetrics(operation: string): PerformanceMetrics[] {
    return Array.from(this.metrics.values())
      .filter(m => m.operation === operation && m.endTime !== undefined);
  }
}

export const logger = new Logger(
  parseLogLevel(process.env.LOG_LEVEL),
  process.env.NODE_ENV !== 'production'
);

export const performanceTracker = new PerformanceTracker();
