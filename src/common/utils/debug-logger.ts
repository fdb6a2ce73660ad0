/**
 * Flow logger for the gateway.
 *
 * Colour-coded, one line per event, so a webhook can be followed from the
 * request to the backend writes in a terminal.
 *
 * Visual Language:
 *   📥 RECV     - Incoming webhook / message
 *   📤 SEND     - Outgoing message to a provider
 *   📬 STATUS   - Delivery status update
 *   🙈 IGNORE   - Request or item ignored
 *   💾 STATE    - Backend writes (DB, Redis)
 *   🔗 LINK     - External HTTP call
 *   ⚡ PERF     - Timing
 *   ⚠️  WARN     - Warning
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.DEBUG_LEVEL;

const config: { enabled: boolean; minLevel: LogLevel; showTimestamp: boolean } = {
  enabled: process.env.DEBUG_LOGS !== '0',
  minLevel: isLogLevel(envLevel) ? envLevel : 'debug',
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
};

const TAG_COLORS: Record<string, string> = {
  RECV: colors.cyan,
  SEND: colors.green,
  STATUS: colors.blue,
  IGNORE: colors.dim,
  STATE: colors.dim,
  LINK: colors.cyan,
  PERF: colors.bright,
  WARN: colors.yellow,
};

function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatChannel(channelUuid?: string): string {
  if (!channelUuid) return '';
  return `${colors.dim}[${channelUuid.slice(0, 8)}]${colors.reset} `;
}

class DebugLogger {
  constructor(private readonly context: string) {}

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: Record<string, unknown>,
    channelUuid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColor = TAG_COLORS[tag] || colors.white;
    let line = `${timestamp()}${formatChannel(channelUuid)}${emoji} ${tagColor}${tag.padEnd(7)}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    console.log(line);
  }

  recv(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('info', '📥', 'RECV', message, data, channelUuid);
  }

  send(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('info', '📤', 'SEND', message, data, channelUuid);
  }

  status(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('info', '📬', 'STATUS', message, data, channelUuid);
  }

  ignore(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('debug', '🙈', 'IGNORE', message, data, channelUuid);
  }

  state(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('debug', '💾', 'STATE', message, data, channelUuid);
  }

  link(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('info', '🔗', 'LINK', message, data, channelUuid);
  }

  perf(message: string, ms: number, channelUuid?: string) {
    const color = ms < 100 ? colors.green : ms < 500 ? colors.yellow : colors.red;
    this.log('info', '⚡', 'PERF', message, { time: `${color}${formatMs(ms)}${colors.reset}` }, channelUuid);
  }

  warn(message: string, data?: Record<string, unknown>, channelUuid?: string) {
    this.log('warn', '⚠️ ', 'WARN', message, data, channelUuid);
  }

  child(subContext: string): DebugLogger {
    return new DebugLogger(`${this.context}:${subContext}`);
  }

  /** Start a timer and return a function to log the elapsed time */
  timer(label: string, channelUuid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, channelUuid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

export const debugLog = {
  gateway: createDebugLogger('gateway'),
  handlers: createDebugLogger('handlers'),
  sender: createDebugLogger('sender'),
  backend: createDebugLogger('backend'),
};

export { DebugLogger };
