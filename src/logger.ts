/**
 * Scoped debug logging.
 *
 * Control via environment variable:
 *   DEBUG=haul,cost  (enable specific scopes)
 *   DEBUG=*          (enable all scopes)
 *   DEBUG=           (quiet, the default)
 *
 * Warnings and errors always print.
 */

export type LogScope = 'grid' | 'earthwork' | 'slope' | 'haul' | 'cost' | 'engine';

class GradingLogger {
  private enabledScopes: Set<string>;
  private enableAll: boolean;

  constructor(debugEnv: string) {
    if (debugEnv.trim() === '*') {
      this.enableAll = true;
      this.enabledScopes = new Set();
    } else {
      this.enableAll = false;
      this.enabledScopes = new Set(
        debugEnv.split(',').map(s => s.trim()).filter(Boolean)
      );
    }
  }

  isEnabled(scope: LogScope): boolean {
    return this.enableAll || this.enabledScopes.has(scope);
  }

  debug(scope: LogScope, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isEnabled(scope)) return;
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] [${scope.toUpperCase()}] ${message}`, metadata ?? '');
  }

  warn(scope: LogScope, message: string, metadata?: Record<string, unknown>): void {
    console.warn(`[WARN] [${scope.toUpperCase()}] ${message}`, metadata ?? '');
  }

  error(scope: LogScope, message: string, error?: unknown): void {
    console.error(`[ERROR] [${scope.toUpperCase()}] ${message}`, error ?? '');
  }
}

export function createLogger(debugEnv: string): GradingLogger {
  return new GradingLogger(debugEnv);
}

export type { GradingLogger };

export const logger = createLogger(process.env.DEBUG ?? '');
