import { storage } from '../storage';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'success';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  success: 20,
  warning: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  success: 'OK',
  warning: 'WARN',
  error: 'ERROR',
};

function isThresholdName(value: string): value is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function consoleThreshold(): number {
  const configured = process.env.LOG_LEVEL;
  return configured && isThresholdName(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info;
}

/**
 * Console + system_logs logger. Persisting is best effort: a storage failure
 * is reported on stderr and never reaches the caller.
 */
export class Logger {
  static async debug(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    await Logger.write('debug', message, component, metadata);
  }

  static async info(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    await Logger.write('info', message, component, metadata);
  }

  static async success(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    await Logger.write('success', message, component, metadata);
  }

  static async warning(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    await Logger.write('warning', message, component, metadata);
  }

  static async error(message: string, component: string, metadata?: Record<string, unknown>): Promise<void> {
    await Logger.write('error', message, component, metadata);
  }

  private static async write(
    level: LogLevel,
    message: string,
    component: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    if (LEVEL_RANK[level] >= consoleThreshold()) {
      const time = new Date().toISOString().slice(11, 19);
      const line = `${time} [${component}] ${LEVEL_LABEL[level]} ${message}`;
      if (level === 'error') {
        console.error(line);
      } else if (level === 'warning') {
        console.warn(line);
      } else {
        console.log(line);
      }
    }

    // Debug chatter stays on the console
    if (level === 'debug') return;

    try {
      await storage.createSystemLog({ level, message, component, metadata: metadata ?? null });
    } catch (error) {
      console.error(`[Logger] Failed to persist log entry: ${error instanceof Error ? error.message : error}`);
    }
  }
}
