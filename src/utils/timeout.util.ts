export class TimeoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TimeoutError';
    }
}

/**
 * Race an operation against a timer
 *
 * The operation itself keeps running after a timeout; callers only stop waiting for it.
 */
export async function withTimeout<T>(
    operation: () => Promise<T>,
    timeoutMs: number,
    timeoutMessage: string = 'Operation timed out'
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(timeoutMessage)), timeoutMs);
    });

    try {
        return await Promise.race([operation(), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
