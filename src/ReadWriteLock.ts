/**
 * Exclusive-write / shared-read section for synchronous callers.
 *
 * Everything here runs to completion on one thread, so the only way two
 * sections overlap is re-entry: a collaborator called from inside a section
 * calling back into the guarded object. That is rejected instead of letting a
 * write interleave with a half-finished read or write.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;

  constructor(private readonly name = 'lock') {}

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get readerCount(): number {
    return this.readers;
  }

  withReadLock<T>(fn: () => T): T {
    if (this.writing) {
      throw new Error(`${this.name}: read section entered during a write section`);
    }
    this.readers++;
    try {
      return fn();
    } finally {
      this.readers--;
    }
  }

  withWriteLock<T>(fn: () => T): T {
    if (this.writing) {
      throw new Error(`${this.name}: write section is not re-entrant`);
    }
    if (this.readers > 0) {
      throw new Error(`${this.name}: write section entered during a read section`);
    }
    this.writing = true;
    try {
      return fn();
    } finally {
      this.writing = false;
    }
  }
}
