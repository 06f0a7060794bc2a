import { GazeErrorKind } from './types';

export class GazeSourceError extends Error {
    readonly kind: GazeErrorKind;

    constructor(kind: GazeErrorKind, message: string) {
        super(message);
        this.name = 'GazeSourceError';
        this.kind = kind;
    }
}

export class ConnectionFailedError extends GazeSourceError {
    constructor(message: string) {
        super('ConnectionFailed', message);
        this.name = 'ConnectionFailedError';
    }
}

export class HandshakeFailedError extends GazeSourceError {
    constructor(message: string) {
        super('HandshakeFailed', message);
        this.name = 'HandshakeFailedError';
    }
}

export class MalformedMessageError extends GazeSourceError {
    constructor(message: string) {
        super('MalformedMessage', message);
        this.name = 'MalformedMessageError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
