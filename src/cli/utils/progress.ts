const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Terminal spinner. When stdout is not a TTY (piped output, CI) it prints
 * the start and final messages as plain lines instead of animating.
 */
export class ProgressIndicator {
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private message: string;
  private interactive = Boolean(process.stdout.isTTY);

  constructor(message: string) {
    this.message = message;
  }

  start(): void {
    if (!this.interactive) {
      console.log(`… ${this.message}`);
      return;
    }
    process.stdout.write('\x1B[?25l');
    this.interval = setInterval(() => {
      process.stdout.write(`\r${SPINNER_FRAMES[this.currentFrame]} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % SPINNER_FRAMES.length;
    }, 100);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(finalMessage?: string): void {
    this.finish(finalMessage ? `✅ ${finalMessage}` : undefined);
  }

  fail(errorMessage?: string): void {
    this.finish(errorMessage ? `❌ ${errorMessage}` : undefined);
  }

  private finish(line?: string): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.interactive) {
      process.stdout.write('\r\x1B[K\x1B[?25h');
    }
    if (line) {
      console.log(line);
    }
  }
}

export class ProgressBar {
  private total: number;
  private current = 0;
  private width = 40;
  private message: string;

  constructor(total: number, message: string) {
    this.total = total;
    this.message = message;
  }

  update(current: number, message?: string): void {
    this.current = Math.min(current, this.total);
    if (message) {
      this.message = message;
    }

    const ratio = this.total > 0 ? this.current / this.total : 1;
    const filled = Math.round(ratio * this.width);
    const bar = '█'.repeat(filled) + '░'.repeat(this.width - filled);
    const line = `${this.message} [${bar}] ${Math.round(ratio * 100)}% (${this.current}/${this.total})`;

    if (process.stdout.isTTY) {
      process.stdout.write(`\r${line}`);
    }
  }

  finish(message?: string): void {
    this.update(this.total, message);
    if (process.stdout.isTTY) {
      process.stdout.write('\n');
    }
  }
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${ms}ms`;
}
