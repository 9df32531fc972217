import { componentLogger } from '@generic-interface/service-template';
import { AuthConfig } from '../types';
import { setHeader } from './http';

const log = componentLogger('transport-auth');

export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

export type AuthScheme =
    | { kind: 'none' }
    | { kind: 'basic'; user: string; password: string }
    | { kind: 'apiKey'; value: string; header: string }
    // Token based schemes are accepted in stored configs but apply nothing yet.
    | { kind: 'bearer' }
    | { kind: 'oauth2' }
    | { kind: 'jwt' };

export const resolveAuth = (auth: AuthConfig | undefined): AuthScheme => {
    switch (auth?.AuthType ?? '') {
        case 'BasicAuth':
            if (!auth?.BasicAuthUser) return { kind: 'none' };
            return { kind: 'basic', user: auth.BasicAuthUser, password: auth.BasicAuthPassword ?? '' };
        case 'APIKey':
            if (!auth?.APIKey) return { kind: 'none' };
            return { kind: 'apiKey', value: auth.APIKey, header: auth.APIKeyHeader || DEFAULT_API_KEY_HEADER };
        case 'Bearer':
            return { kind: 'bearer' };
        case 'OAuth2':
            return { kind: 'oauth2' };
        case 'JWT':
            return { kind: 'jwt' };
        case '':
            return { kind: 'none' };
        default:
            log.debug('Unknown authentication type, sending request unauthenticated', { auth_type: auth?.AuthType });
            return { kind: 'none' };
    }
};

export const basicCredentials = (user: string, password: string): string =>
    Buffer.from(`${user}:${password}`, 'utf8').toString('base64');

/** Writes the auth header for the scheme into `headers`. */
export const applyAuth = (headers: Record<string, string>, scheme: AuthScheme): void => {
    switch (scheme.kind) {
        case 'basic':
            setHeader(headers, 'Authorization', `Basic ${basicCredentials(scheme.user, scheme.password)}`);
            break;
        case 'apiKey':
            setHeader(headers, scheme.header, scheme.value);
            break;
        case 'bearer':
        case 'oauth2':
        case 'jwt':
            log.debug('Authentication scheme not implemented, skipping', { scheme: scheme.kind });
            break;
        case 'none':
            break;
    }
};
