/**
 * Clock abstraction for testable time operations
 * Enables deterministic time control in tests while using system time in production
 */

/**
 * Clock interface for time operations
 * All time-dependent code (timestamps, retry backoff) should use this instead of `new Date()` or `setTimeout`
 */
export interface IClock {
    /**
     * Get current time as Date object
     */
    now(): Date

    /**
     * Get current time as ISO 8601 string
     */
    nowIso(): string

    /**
     * Suspend for the given number of milliseconds
     */
    sleep(ms: number): Promise<void>
}

/**
 * Production implementation using system time
 */
export class SystemClock implements IClock {
    now(): Date {
        return new Date()
    }

    nowIso(): string {
        return new Date().toISOString()
    }

    sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms))
    }
}

/**
 * Test implementation with controllable time
 * `sleep` resolves immediately, records the requested delay and advances the clock.
 */
export class FakeClock implements IClock {
    private currentTime: Date
    public readonly sleeps: number[] = []

    constructor(initialTime: Date = new Date('2025-01-01T00:00:00.000Z')) {
        this.currentTime = new Date(initialTime)
    }

    now(): Date {
        return new Date(this.currentTime)
    }

    nowIso(): string {
        return this.currentTime.toISOString()
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms)
        this.advance(ms)
    }

    /**
     * Advance clock by specified milliseconds
     */
    advance(ms: number): void {
        this.currentTime = new Date(this.currentTime.getTime() + ms)
    }

    /**
     * Set clock to specific time
     */
    setTime(time: Date): void {
        this.currentTime = new Date(time)
    }
}
