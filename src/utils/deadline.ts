export class DeadlineExceededError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Timed out after ${timeoutMs} ms`);
        this.name = 'DeadlineExceededError';
    }
}

/**
 * Runs `work` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with DeadlineExceededError at the deadline even when `work`
 * ignores the signal.
 */
export async function withDeadline<T>(timeoutMs: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new DeadlineExceededError(timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });
    try {
        return await Promise.race([work(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
