import type { Platform } from '../platform';

/** Bounded stack of deactivated platforms kept for reuse. */
export class PlatformPool {
  private readonly idle: Platform[] = [];

  constructor(private capacity: number) {}

  get size(): number {
    return this.idle.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  setCapacity(capacity: number): void {
    this.capacity = Math.max(0, Math.floor(capacity));
  }

  /** Deactivates `platform` and keeps it if there is room; returns whether it was kept. */
  release(platform: Platform): boolean {
    platform.active = false;
    if (this.idle.length >= this.capacity) {
      return false;
    }
    this.idle.push(platform);
    return true;
  }

  take(): Platform | undefined {
    return this.idle.pop();
  }

  /** Drops idle platforms beyond `keep`; returns how many were dropped. */
  trim(keep: number): number {
    const target = Math.max(0, Math.floor(keep));
    const excess = this.idle.length - target;
    if (excess <= 0) {
      return 0;
    }
    this.idle.length = target;
    return excess;
  }

  clear(): void {
    this.idle.length = 0;
  }
}
