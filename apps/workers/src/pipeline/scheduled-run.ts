import { Logger } from '@nestjs/common';

/**
 * Runs a task on demand, at most one at a time. A trigger that arrives while
 * the task is still running is skipped.
 */
export class ScheduledRun {
  private readonly logger = new Logger(ScheduledRun.name);
  private running = false;

  constructor(private readonly task: () => Promise<void>) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * @returns false when the trigger was skipped
   */
  async trigger(source: string): Promise<boolean> {
    if (this.running) {
      this.logger.warn(`Skipping ${source}: previous run still in progress`);
      return false;
    }

    this.running = true;
    try {
      await this.task();
      return true;
    } finally {
      this.running = false;
    }
  }
}
