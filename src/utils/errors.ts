/**
 * Failures that end a turn without an assistant Message. Anything else a
 * collaborator throws is converted into one of these, or into an execution
 * result, before it reaches the caller.
 */
export abstract class TurnError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ModelUnavailableError extends TurnError {}

export class ModelTimeoutError extends TurnError {
    constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
        super(`Model did not respond within ${timeoutMs} ms`, options);
    }
}

export class SessionBusyError extends TurnError {
    constructor(readonly sessionId: string) {
        super(`A turn is already running for session ${sessionId}`);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
