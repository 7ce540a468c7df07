/**
 * Error types
 *
 * Every failure the client core raises on purpose is one of these, so callers
 * can branch on `instanceof` or on the stable `code`.
 */

export type ErrorCode =
    | 'MALFORMED_MESSAGE'
    | 'TRANSPORT_CLOSED'
    | 'UNKNOWN_FIELD'
    | 'KICKED'
    | 'HANDSHAKE_TIMEOUT';

export class TilesyncError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A datagram could not be decoded (unknown tag, truncated payload, bad UTF-8)
 * or a message could not be encoded (value outside its field's range).
 */
export class MalformedMessageError extends TilesyncError {
    constructor(message: string) {
        super('MALFORMED_MESSAGE', message);
    }
}

/** The transport was closed locally or by the peer. */
export class TransportClosedError extends TilesyncError {
    constructor(message: string = 'Transport is closed') {
        super('TRANSPORT_CLOSED', message);
    }
}

/**
 * A component was asked to read or write a field its schema does not declare.
 * This is a contract violation, not a recoverable condition.
 */
export class UnknownFieldError extends TilesyncError {
    readonly component: string;
    readonly field: string;

    constructor(component: string, field: string) {
        super('UNKNOWN_FIELD', `Component '${component}' has no field '${field}'`);
        this.component = component;
        this.field = field;
    }
}

/** The server ended the session. `reason` is the server's human-readable text. */
export class KickedError extends TilesyncError {
    readonly reason: string;

    constructor(reason: string) {
        super('KICKED', `Kicked by server: ${reason}`);
        this.reason = reason;
    }
}

export class HandshakeTimeoutError extends TilesyncError {
    constructor(timeoutMs: number) {
        super('HANDSHAKE_TIMEOUT', `No welcome from server within ${timeoutMs}ms`);
    }
}
