/**
 * Connection state shared by the receiver (writer) and the tick (reader).
 *
 * running -> terminated, once. The first reason recorded wins.
 */

export type TerminationReason = 'kicked' | 'transport-closed' | 'goodbye' | 'error';

export type TerminationListener = (reason: TerminationReason, detail: string | null) => void;

export class ConnectionState {
    private reasonValue: TerminationReason | null = null;
    private detailValue: string | null = null;
    private readonly listeners: TerminationListener[] = [];

    get terminated(): boolean {
        return this.reasonValue !== null;
    }

    get reason(): TerminationReason | null {
        return this.reasonValue;
    }

    /** The server's text when the reason is 'kicked'. */
    get kickReason(): string | null {
        return this.reasonValue === 'kicked' ? this.detailValue : null;
    }

    /**
     * Mark the connection terminated. Returns false if it already was.
     */
    terminate(reason: TerminationReason, detail: string | null = null): boolean {
        if (this.reasonValue !== null) return false;
        this.reasonValue = reason;
        this.detailValue = detail;
        for (const listener of this.listeners) {
            listener(reason, detail);
        }
        return true;
    }

    onTerminate(listener: TerminationListener): void {
        this.listeners.push(listener);
    }
}
