export type WebserviceErrorCode =
    | 'CONFIG_NOT_FOUND'
    | 'CONFIG_LOOKUP_FAILED'
    | 'CONFIG_INACTIVE'
    | 'CONFIG_INVALID'
    | 'INVOKER_NOT_FOUND'
    | 'TRANSPORT_NOT_REGISTERED'
    | 'TRANSPORT_FAILED'
    | 'MAPPING_FAILED'
    | 'HISTORY_NOT_FOUND';

/**
 * Failure raised before or while trying to reach the remote system.
 * A remote system that answered with an error is reported in the response instead.
 */
export class WebserviceError extends Error {
    public readonly code: WebserviceErrorCode;
    public readonly webservice?: string;
    public readonly invoker?: string;
    public readonly details?: unknown;

    constructor(args: {
        code: WebserviceErrorCode;
        message: string;
        webservice?: string;
        invoker?: string;
        details?: unknown;
        cause?: unknown;
    }) {
        super(args.message, { cause: args.cause });
        this.name = 'WebserviceError';
        this.code = args.code;
        this.webservice = args.webservice;
        this.invoker = args.invoker;
        this.details = args.details;
    }
}

export const isWebserviceError = (err: unknown): err is WebserviceError => err instanceof WebserviceError;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const STATUS_BY_CODE: Record<WebserviceErrorCode, number> = {
    CONFIG_NOT_FOUND: 404,
    CONFIG_LOOKUP_FAILED: 500,
    CONFIG_INACTIVE: 409,
    CONFIG_INVALID: 400,
    INVOKER_NOT_FOUND: 404,
    TRANSPORT_NOT_REGISTERED: 400,
    TRANSPORT_FAILED: 502,
    MAPPING_FAILED: 422,
    HISTORY_NOT_FOUND: 404,
};

export const httpStatusFor = (err: unknown): number => (isWebserviceError(err) ? STATUS_BY_CODE[err.code] : 500);
