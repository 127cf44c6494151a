/**
 * Raised for a command line that cannot be turned into enumeration options.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}
