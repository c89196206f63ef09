import { Cron } from "croner";
import { getErrorMessage } from "@/common/utils/errors";
import { formatBackupError } from "@/common/utils/errors/formatStoreError";
import type { BackupService } from "@/node/services/backupService";
import { log } from "@/node/services/log";

export const DEFAULT_BACKUP_SCHEDULE = "@daily";

export interface BackupSchedulerOptions {
  /** Cron pattern understood by croner. */
  pattern?: string;
  /** Take a backup as soon as the scheduler starts. */
  backupOnStart?: boolean;
}

/**
 * Runs BackupService.createBackup() once at startup and then on a croner
 * schedule. The timer is unref'd so a pending run never keeps the process alive.
 */
export class BackupScheduler {
  private readonly backups: BackupService;
  private readonly pattern: string;
  private readonly backupOnStart: boolean;
  private timer: Cron | null = null;
  /** Set while a run is in progress; overlapping fires are skipped. */
  private running: Promise<void> | null = null;

  constructor(backups: BackupService, options: BackupSchedulerOptions = {}) {
    this.backups = backups;
    this.pattern = options.pattern ?? DEFAULT_BACKUP_SCHEDULE;
    this.backupOnStart = options.backupOnStart ?? true;
  }

  /** Arm the timer, then wait for the startup backup (if enabled). Calling twice is a no-op. */
  async start(): Promise<void> {
    if (this.timer) {
      return;
    }

    try {
      this.timer = new Cron(this.pattern, { unref: true }, () => {
        void this.runOnce();
      });
    } catch (err) {
      log.warn(`[BackupScheduler] Invalid schedule "${this.pattern}"; automatic backups disabled`, {
        error: getErrorMessage(err),
      });
      return;
    }
    log.debug(`[BackupScheduler] Armed (${this.pattern}), next run ${this.nextRunAt()?.toISOString() ?? "never"}`);

    if (this.backupOnStart) {
      await this.runOnce();
    }
  }

  stop(): void {
    this.timer?.stop();
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  nextRunAt(): Date | null {
    return this.timer?.nextRun() ?? null;
  }

  /** One backup run. Never rejects; a failed run is logged and the next one retries. */
  runOnce(): Promise<void> {
    if (this.running) {
      log.debug("[BackupScheduler] Previous backup still running; skipping");
      return this.running;
    }
    this.running = this.backups
      .createBackup()
      .then((result) => {
        if (!result.success) {
          log.warn(`[BackupScheduler] ${formatBackupError(result.error)}`);
        }
      })
      .catch((err: unknown) => {
        log.error("[BackupScheduler] Unexpected backup error", { error: getErrorMessage(err) });
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }
}
