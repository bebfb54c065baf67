/**
 * A request the service refuses to process (bad or unreadable upload).
 * `statusCode` is what the HTTP layer answers with.
 */
export class UploadRejectedError extends Error {
    constructor(message: string, public readonly statusCode: number = 422) {
        super(message);
        this.name = 'UploadRejectedError';
    }
}
