// src/utils/httpError.ts
/** Error carrying the HTTP status the errorHandler should answer with. */
export class HttpError extends Error {
    constructor(public readonly status: number, message: string) {
        super(message);
        this.name = "HttpError";
    }
}
