import * as sax from 'sax';
import { componentLogger } from '@generic-interface/service-template';
import { Transport, TransportCallOptions, TransportRequest, TransportResponse } from './Transport';
import { applyAuth, resolveAuth } from './auth';
import {
    CONNECTION_TEST_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS,
    HttpClient,
    applyAdditionalHeaders,
    buildHttpsAgent,
    buildProxy,
    createHttpClient,
    isSuccessStatus,
    normalizeHeaders,
    parseTimeout,
    send,
    setHeader,
    toBuffer,
} from './http';
import { WebserviceError, errorMessage } from '../errors';
import { formatValue } from '../payload';
import { Payload, TRANSPORT_TYPES, TransportHTTPConfig } from '../types';

const log = componentLogger('soap-transport');

export const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
export const DEFAULT_NAMESPACE = 'http://tempuri.org/';

const FAULT_TAG_PREFIXES = ['', 'soap:', 'SOAP-ENV:'];

export interface SoapFault {
    faultCode: string;
    faultString: string;
    detail: string;
}

export type SoapParseResult = { kind: 'data'; data: Payload } | { kind: 'fault'; fault: SoapFault };

export interface SoapTransportOptions {
    client?: HttpClient;
    defaultTimeoutMs?: number;
}

interface BodyEncoding {
    label: string;
    buffer: BufferEncoding;
}

export const escapeXml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;')
        .replace(/\r/g, '&#xD;');

export const formatSoapFault = (fault: SoapFault): string => {
    const message = `SOAP Fault: ${fault.faultCode} - ${fault.faultString}`;
    return fault.detail ? `${message} (${fault.detail})` : message;
};

const resolveEncoding = (encoding: string | undefined): BodyEncoding => {
    const normalized = (encoding ?? '').trim().toLowerCase();
    if (normalized === 'iso-8859-1' || normalized === 'latin1') {
        return { label: 'ISO-8859-1', buffer: 'latin1' };
    }
    if (normalized !== '' && normalized !== 'utf-8' && normalized !== 'utf8') {
        log.warn('Unsupported SOAP encoding, sending UTF-8', { encoding });
    }
    return { label: 'UTF-8', buffer: 'utf8' };
};

const soapActionFor = (config: TransportHTTPConfig, operation: string): string | undefined => {
    if (config.SOAPAction) return config.SOAPAction;
    if (operation) return (config.NameSpace || DEFAULT_NAMESPACE) + operation;
    return undefined;
};

export const soapEndpoint = (config: TransportHTTPConfig): string => {
    const host = config.Host ?? '';
    if (!config.Endpoint) return host;
    return `${host.replace(/\/$/, '')}/${config.Endpoint.replace(/^\//, '')}`;
};

/** The operation element: one child per data key, text content escaped. */
export const buildSoapBody = (config: TransportHTTPConfig, request: TransportRequest): string => {
    const namespace = config.NameSpace || DEFAULT_NAMESPACE;
    const operation = request.operation;

    let body = `<${operation} xmlns="${escapeXml(namespace)}">`;
    for (const [key, value] of Object.entries(request.data)) {
        body += `<${key}>${escapeXml(formatValue(value))}</${key}>`;
    }
    body += `</${operation}>`;
    return body;
};

export const buildSoapRequest = (config: TransportHTTPConfig, request: TransportRequest): string => {
    const { label } = resolveEncoding(config.Encoding);
    return (
        `<?xml version="1.0" encoding="${label}"?>\n` +
        `<soap:Envelope xmlns:soap="${SOAP_ENVELOPE_NS}">\n` +
        '  <soap:Body>\n' +
        `    ${buildSoapBody(config, request)}\n` +
        '  </soap:Body>\n' +
        '</soap:Envelope>'
    );
};

/** Text between the first matching start and end tag, tolerant of `soap:`/`SOAP-ENV:` prefixes. */
export const extractXmlValue = (xml: string, element: string): string => {
    for (const prefix of FAULT_TAG_PREFIXES) {
        const startTag = `<${prefix}${element}>`;
        const startIdx = xml.indexOf(startTag);
        if (startIdx === -1) continue;
        const from = startIdx + startTag.length;

        for (const endPrefix of FAULT_TAG_PREFIXES) {
            const endIdx = xml.indexOf(`</${endPrefix}${element}>`, from);
            if (endIdx !== -1) {
                return xml.slice(from, endIdx).trim();
            }
        }
    }
    return '';
};

export const detectSoapFault = (xml: string): SoapFault | undefined => {
    if (!xml.includes('Fault') || !(xml.includes('faultcode') || xml.includes('faultstring'))) {
        return undefined;
    }

    const fault: SoapFault = {
        faultCode: extractXmlValue(xml, 'faultcode'),
        faultString: extractXmlValue(xml, 'faultstring'),
        detail: extractXmlValue(xml, 'detail'),
    };
    return fault.faultCode || fault.faultString ? fault : undefined;
};

const localName = (name: string): string => name.slice(name.lastIndexOf(':') + 1);

const namespaceOf = (tag: sax.Tag | sax.QualifiedTag): string | undefined => {
    const sep = tag.name.indexOf(':');
    const attr = sep === -1 ? 'xmlns' : `xmlns:${tag.name.slice(0, sep)}`;
    const value = tag.attributes[attr];
    if (value === undefined) return undefined;
    return typeof value === 'string' ? value : value.value;
};

/**
 * Streams through the document and records the last non-blank text seen per
 * element local name. For a SOAP 1.1 envelope only the Body content is walked.
 * Leaves sharing a name at different depths overwrite each other.
 */
const TEXT_OUTSIDE_ROOT = 'Text data outside of root node.';

export const flattenXml = (xml: string): Payload => {
    const result: Payload = {};
    // Plain-text bodies carry no elements.
    if (!xml.trimStart().startsWith('<')) {
        return result;
    }

    const stack: string[] = [];
    let currentKey = '';
    let depth = 0;
    let envelope = false;
    let inBody = false;

    let rootClosed = false;

    const parser = sax.parser(true, { trim: false, normalize: false });
    parser.onerror = (err: Error) => {
        // Trailing text after the document element is ignored.
        if (rootClosed && err.message.startsWith(TEXT_OUTSIDE_ROOT)) {
            parser.resume();
            return;
        }
        throw err;
    };

    parser.onopentag = (tag) => {
        const name = localName(tag.name);
        depth++;

        if (depth === 1) {
            envelope = name === 'Envelope' && namespaceOf(tag) === SOAP_ENVELOPE_NS;
        }
        if (envelope) {
            if (depth === 2 && name === 'Body') {
                inBody = true;
                return;
            }
            if (!inBody) return;
        }

        stack.push(name);
        currentKey = name;
    };

    parser.onclosetag = () => {
        depth--;
        if (depth === 0) rootClosed = true;
        if (envelope) {
            if (inBody && depth === 1) {
                inBody = false;
                return;
            }
            if (!inBody) return;
        }

        stack.pop();
        if (stack.length > 0) {
            currentKey = stack[stack.length - 1];
        }
    };

    const onText = (text: string) => {
        if (envelope && !inBody) return;
        const value = text.trim();
        if (value !== '' && currentKey !== '' && stack.length > 0) {
            result[currentKey] = value;
        }
    };
    parser.ontext = onText;
    parser.oncdata = onText;

    parser.write(xml).close();
    return result;
};

/** Fault check first (plain text search), then structured parsing. Throws on malformed XML. */
export const parseSoapResponse = (xml: string): SoapParseResult => {
    const fault = detectSoapFault(xml);
    if (fault) {
        return { kind: 'fault', fault };
    }
    return { kind: 'data', data: flattenXml(xml) };
};

export class SoapTransport implements Transport {
    readonly type = TRANSPORT_TYPES.SOAP;
    private readonly client: HttpClient;
    private readonly defaultTimeoutMs: number;

    constructor(options: SoapTransportOptions = {}) {
        this.client = options.client ?? createHttpClient();
        this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    async execute(config: TransportHTTPConfig, request: TransportRequest, options: TransportCallOptions = {}): Promise<TransportResponse> {
        const encoding = resolveEncoding(config.Encoding);
        const payload = Buffer.from(buildSoapRequest(config, request), encoding.buffer);
        const endpoint = soapEndpoint(config);

        const headers: Record<string, string> = {
            'Content-Type': `text/xml; charset=${encoding.label.toLowerCase()}`,
        };
        const soapAction = soapActionFor(config, request.operation);
        if (soapAction !== undefined) {
            setHeader(headers, 'SOAPAction', soapAction);
        }
        applyAdditionalHeaders(headers, config.AdditionalHeaders);
        applyAuth(headers, resolveAuth(config.Authentication));

        log.debug('Executing SOAP request', { endpoint, operation: request.operation, soap_action: soapAction });

        const response = await send(this.client, {
            method: 'POST',
            url: endpoint,
            headers,
            data: payload,
            timeout: parseTimeout(config.Timeout, this.defaultTimeoutMs),
            signal: options.signal,
            proxy: buildProxy(config.Proxy),
            httpsAgent: buildHttpsAgent(config.SSL),
        });

        const raw = toBuffer(response.data);
        const result: TransportResponse = {
            success: isSuccessStatus(response.status),
            raw,
            statusCode: response.status,
            headers: normalizeHeaders(response.headers),
        };

        if (raw.length > 0) {
            try {
                const parsed = parseSoapResponse(raw.toString('utf8'));
                if (parsed.kind === 'fault') {
                    result.success = false;
                    result.error = formatSoapFault(parsed.fault);
                } else {
                    result.data = parsed.data;
                }
            } catch (err) {
                result.success = false;
                result.error = `Failed to parse SOAP response: ${errorMessage(err)}`;
            }
        }

        if (!result.success && !result.error) {
            result.error = `HTTP ${response.status}: ${raw.toString('utf8')}`;
        }

        return result;
    }

    async testConnection(config: TransportHTTPConfig, options: TransportCallOptions = {}): Promise<void> {
        const headers: Record<string, string> = {};
        applyAuth(headers, resolveAuth(config.Authentication));

        try {
            await send(this.client, {
                method: 'GET',
                url: soapEndpoint(config),
                headers,
                timeout: CONNECTION_TEST_TIMEOUT_MS,
                signal: options.signal,
                proxy: buildProxy(config.Proxy),
                httpsAgent: buildHttpsAgent(config.SSL),
            });
        } catch (err) {
            throw new WebserviceError({
                code: 'TRANSPORT_FAILED',
                message: `connection failed: ${errorMessage(err)}`,
                cause: err,
            });
        }
    }
}
