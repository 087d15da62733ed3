import { BackupInProgressError } from '../utils/errors.js';

/**
 * In-process mutual exclusion per backup job.
 * acquire() fails fast instead of queueing a second run behind the first.
 */
export class JobLock {
  private readonly held = new Set<number>();

  acquire(jobId: number): () => void {
    if (this.held.has(jobId)) {
      throw new BackupInProgressError(jobId);
    }
    this.held.add(jobId);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(jobId);
    };
  }

  isHeld(jobId: number): boolean {
    return this.held.has(jobId);
  }
}
