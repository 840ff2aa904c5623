/**
 * Raised by operations for expected failures: no symbol at the position,
 * nothing to convert, invalid argument values.
 */
export class RefactoringError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RefactoringError';
    }
}
