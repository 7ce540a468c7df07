/**
 * Bounded chat history. Lines are stored pre-formatted as "[sender] text";
 * once the log is full the oldest line is dropped.
 */

export const SYSTEM_SENDER = 'server';

export class ChatLog {
    private readonly lines: string[] = [];

    constructor(readonly capacity: number = 50) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Chat capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.lines.length;
    }

    append(sender: string, text: string): void {
        if (this.lines.length === this.capacity) {
            this.lines.shift();
        }
        this.lines.push(`[${sender}] ${text}`);
    }

    appendSystem(text: string): void {
        this.append(SYSTEM_SENDER, text);
    }

    /** Oldest first. */
    all(): readonly string[] {
        return this.lines.slice();
    }

    clear(): void {
        this.lines.length = 0;
    }
}
