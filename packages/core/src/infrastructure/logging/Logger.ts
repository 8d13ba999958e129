import type { LogLevel } from '@ledgerlift/config';
import type { ILogger, LogContext, PhaseProgress, ProgressInfo, ProgressPhase } from '../../application/ports/ILogger.ts';
import { LOG_LEVEL_VALUES, verbosityToLogLevel } from '../../application/ports/ILogger.ts';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  error: COLORS.red,
  warn: COLORS.yellow,
  info: COLORS.green,
  debug: COLORS.cyan,
  trace: COLORS.gray,
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  error: 'ERR',
  warn: 'WRN',
  info: 'INF',
  debug: 'DBG',
  trace: 'TRC',
};

const PHASE_COLORS: Record<ProgressPhase, string> = {
  indexing: COLORS.cyan,
  preparing: COLORS.blue,
  committing: COLORS.yellow,
  verifying: COLORS.green,
};

/** Context keys rendered in the line prefix rather than as key=value */
const PREFIX_KEYS = ['module', 'network', 'error'];

type PhaseState = PhaseProgress & { detail?: string };

/**
 * Console logger with a single-line progress display
 */
export class Logger implements ILogger {
  readonly level: LogLevel;
  private readonly timestamps: boolean;
  private readonly json: boolean;
  private readonly showProgress: boolean;
  private readonly context: LogContext;
  private progressLine: string | null = null;
  private lastProgressUpdate = 0;
  private readonly progressThrottleMs = 250;

  // Latest report per phase, rendered together
  private readonly phases = new Map<ProgressPhase, PhaseState>();

  constructor(config: {
    level: LogLevel;
    timestamps?: boolean;
    json?: boolean;
    progress?: boolean;
    context?: LogContext;
  }) {
    this.level = config.level;
    this.timestamps = config.timestamps ?? true;
    this.json = config.json ?? false;
    this.showProgress = config.progress ?? true;
    this.context = config.context ?? {};
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  progress(info: ProgressInfo): void {
    if (!this.showProgress) return;

    const state: PhaseState = {
      current: info.current,
      total: info.total,
      percentage: Math.min(100, Math.max(0, info.percentage)),
      rate: info.rate,
      detail: info.detail,
    };

    if (state.percentage >= 100) {
      this.phases.delete(info.phase);
    } else {
      this.phases.set(info.phase, state);
    }

    const now = Date.now();
    if (now - this.lastProgressUpdate < this.progressThrottleMs) return;
    this.lastProgressUpdate = now;

    this.renderProgress();
  }

  private renderProgress(): void {
    const parts: string[] = [];

    for (const [phase, state] of this.phases) {
      const segment = [
        `${PHASE_COLORS[phase]}${phase}${COLORS.reset}:${this.miniBar(state.percentage)}${state.percentage.toFixed(1)}%`,
      ];

      if (state.rate && state.rate > 0) {
        segment.push(`${COLORS.dim}${this.formatRate(state.rate)}${COLORS.reset}`);
      }

      const eta = this.calculateEta(state);
      if (eta) {
        segment.push(`${COLORS.dim}ETA ${eta}${COLORS.reset}`);
      }

      if (state.detail) {
        segment.push(state.detail);
      }

      parts.push(segment.join(' '));
    }

    if (parts.length === 0) return;

    this.progressLine = parts.join(' | ');

    if (process.stdout.isTTY) {
      process.stdout.write(`\r\x1b[K${this.progressLine}`);
    }
  }

  /**
   * Progress line without ANSI codes
   */
  getProgressText(): string | null {
    if (!this.progressLine) return null;
    return this.progressLine.replace(/\x1b\[[0-9;]*m/g, '');
  }

  /**
   * Create a mini progress bar (5 chars)
   */
  private miniBar(percentage: number): string {
    const width = 5;
    const filled = Math.round((percentage / 100) * width);
    return `${COLORS.dim}[${COLORS.reset}${'█'.repeat(filled)}${'░'.repeat(width - filled)}${COLORS.dim}]${COLORS.reset}`;
  }

  private formatRate(rate: number): string {
    if (rate >= 1000) {
      return `${(rate / 1000).toFixed(1)}k/s`;
    }
    return `${rate.toFixed(0)}/s`;
  }

  private calculateEta(state: PhaseState): string | null {
    if (!state.rate || state.rate <= 0) return null;
    const seconds = (state.total - state.current) / state.rate;
    return this.formatEtaCompact(seconds) || null;
  }

  /**
   * Format ETA in compact form (e.g., "5m32s", "2h15m")
   */
  private formatEtaCompact(seconds: number): string {
    if (!seconds || seconds <= 0 || !isFinite(seconds)) return '';

    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const secs = Math.floor(seconds % 60);

    if (hours > 0) {
      return `${hours}h${minutes}m`;
    } else if (minutes > 0) {
      return `${minutes}m${secs}s`;
    }
    return `${secs}s`;
  }

  clearProgress(): void {
    if (this.progressLine && process.stdout.isTTY) {
      process.stdout.write('\r\x1b[K');
    }
    this.progressLine = null;
  }

  child(context: LogContext): ILogger {
    return new Logger({
      level: this.level,
      timestamps: this.timestamps,
      json: this.json,
      progress: this.showProgress,
      context: { ...this.context, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    this.clearProgress();

    const mergedContext = { ...this.context, ...context };

    if (this.json) {
      this.logJson(level, message, mergedContext);
    } else {
      this.logPretty(level, message, mergedContext);
    }
  }

  private logJson(level: LogLevel, message: string, context: LogContext): void {
    const entry: Record<string, unknown> = {
      level,
      message,
      ...context,
    };

    if (this.timestamps) {
      entry.timestamp = new Date().toISOString();
    }

    if (context.error instanceof Error) {
      entry.error = {
        name: context.error.name,
        message: context.error.message,
        stack: context.error.stack,
      };
    }

    // Balances are bigint
    const serialized = JSON.stringify(entry, (_, value) =>
      typeof value === 'bigint' ? value.toString() : value
    );

    console.log(serialized);
  }

  private logPretty(level: LogLevel, message: string, context: LogContext): void {
    const color = LEVEL_COLORS[level];
    const prefix = LEVEL_PREFIX[level];

    let output = '';

    if (this.timestamps) {
      const time = new Date().toISOString().replace('T', ' ').slice(0, -1);
      output += `${COLORS.dim}${time}${COLORS.reset} `;
    }

    output += `${color}${COLORS.bold}${prefix}${COLORS.reset} `;

    if (context.module) {
      output += `${COLORS.magenta}[${context.module}]${COLORS.reset} `;
    }
    if (context.network) {
      output += `${COLORS.blue}[${context.network}]${COLORS.reset} `;
    }

    output += message;

    const contextFields = Object.entries(context).filter(
      ([key, value]) => !PREFIX_KEYS.includes(key) && value !== undefined
    );

    if (contextFields.length > 0) {
      const formatted = contextFields
        .map(([key, value]) => `${COLORS.dim}${key}=${COLORS.reset}${String(value)}`)
        .join(' ');
      output += ` ${formatted}`;
    }

    if (context.error instanceof Error && level !== 'error') {
      output += ` ${COLORS.dim}error=${COLORS.reset}${context.error.message}`;
    }

    console.log(output);

    if (context.error instanceof Error && level === 'error') {
      console.log(`${COLORS.dim}${context.error.stack}${COLORS.reset}`);
    }
  }
}

/**
 * Create a logger from a level or a -v count
 */
export function createLogger(config: {
  level?: LogLevel;
  verbosity?: number;
  timestamps?: boolean;
  json?: boolean;
  progress?: boolean;
  context?: LogContext;
}): ILogger {
  const level = config.verbosity !== undefined ? verbosityToLogLevel(config.verbosity) : (config.level ?? 'info');

  return new Logger({
    level,
    timestamps: config.timestamps,
    json: config.json,
    progress: config.progress,
    context: config.context,
  });
}
