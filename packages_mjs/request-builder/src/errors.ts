export class RequestBuilderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RequestBuilderError';
    }
}

export class InvalidURLError extends RequestBuilderError {
    constructor(public input?: string) {
        super(
            input === undefined
                ? 'Invalid URL: no base URL was set'
                : `Invalid URL: '${input}' could not be parsed as an absolute URL`
        );
        this.name = 'InvalidURLError';
    }
}

export class RequestBuilderConfigError extends RequestBuilderError {
    constructor(message: string) {
        super(message);
        this.name = 'RequestBuilderConfigError';
    }
}
