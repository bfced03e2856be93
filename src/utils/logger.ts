// ============================================
// STRATA - Logger
// Colored console output for the CLI and the migration manager
// ============================================

export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m'
};

export type Color = keyof typeof colors;

export interface Logger {
  log(message: string, color?: Color): void;
  success(message: string): void;
  error(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Only errors are printed */
  quiet?: boolean;
}

export class ConsoleLogger implements Logger {
  private quiet: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.quiet = options.quiet ?? false;
  }

  log(message: string, color: Color = 'reset'): void {
    if (this.quiet) return;
    console.log(`${colors[color]}${message}${colors.reset}`);
  }

  success(message: string): void {
    this.log(`✅ ${message}`, 'green');
  }

  error(message: string): void {
    // Hatalar quiet modda da yazılır
    console.error(`${colors.red}❌ ${message}${colors.reset}`);
  }

  info(message: string): void {
    this.log(`ℹ️  ${message}`, 'blue');
  }

  warn(message: string): void {
    this.log(`⚠️  ${message}`, 'yellow');
  }
}

/**
 * Logger that prints nothing
 */
export const silentLogger: Logger = {
  log: () => undefined,
  success: () => undefined,
  error: () => undefined,
  info: () => undefined,
  warn: () => undefined
};
