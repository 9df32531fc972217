// Persisted GenericInterface configuration. Property names follow the stored
// YAML block verbatim, so they stay PascalCase.

export const VALID_ID_ACTIVE = 1;

export const TRANSPORT_TYPES = {
    REST: 'HTTP::REST',
    SOAP: 'HTTP::SOAP',
} as const;

export type PayloadValue =
    | string
    | number
    | boolean
    | null
    | PayloadValue[]
    | { [key: string]: PayloadValue };

export type Payload = Record<string, PayloadValue>;

export interface DebuggerConfig {
    DebugThreshold?: string; // debug, info, notice, error
    TestMode?: string; // 0 or 1
}

export interface MappingConfig {
    Type?: string; // Simple, XSLT, ...
    Config?: Record<string, unknown>;
}

export interface EventConfig {
    Event?: string;
    Asynchronous?: string;
}

export interface InvokerConfig {
    Type?: string;
    Description?: string;
    Events?: EventConfig[];
    MappingInbound?: MappingConfig;
    MappingOutbound?: MappingConfig;
}

export interface OperationConfig {
    Type?: string;
    Description?: string;
    MappingInbound?: MappingConfig;
    MappingOutbound?: MappingConfig;
}

export interface ControllerMapping {
    Controller?: string;
    Command?: string;
}

export interface AuthConfig {
    AuthType?: string; // BasicAuth, APIKey, Bearer, OAuth2, JWT

    BasicAuthUser?: string;
    BasicAuthPassword?: string;

    APIKey?: string;
    APIKeyHeader?: string;

    OAuth2TokenURL?: string;
    OAuth2ClientID?: string;
    OAuth2ClientSecret?: string;
    OAuth2Scope?: string;

    JWTAuthKeyFilePath?: string;
    JWTAuthKeyFilePassword?: string;
    JWTAuthAlgorithm?: string;
    JWTAuthCertificateFilePath?: string;
    JWTAuthTTL?: string;
    JWTAuthPayload?: string;
    JWTAuthAdditionalHeaderData?: string;
}

export interface SSLConfig {
    SSLVerifyHostname?: string;
    SSLVerifyCert?: string;
    SSLCAFile?: string;
    SSLCADir?: string;
    SSLCertFile?: string;
    SSLKeyFile?: string;
}

export interface ProxyConfig {
    UseProxy?: string;
    ProxyHost?: string;
    ProxyPort?: string;
    ProxyUser?: string;
    ProxyPassword?: string;
}

export interface TransportHTTPConfig {
    Host?: string;
    DefaultCommand?: string;
    Timeout?: string; // seconds

    InvokerControllerMapping?: Record<string, ControllerMapping>;
    AdditionalHeaders?: Record<string, string>;
    MaxLength?: string;
    KeepAlive?: string;

    // SOAP
    Encoding?: string;
    Endpoint?: string;
    NameSpace?: string;
    SOAPAction?: string;

    Authentication?: AuthConfig;
    SSL?: SSLConfig;
    Proxy?: ProxyConfig;
}

export interface TransportConfig {
    Type?: string;
    Config?: TransportHTTPConfig;
}

export interface RequesterConfig {
    Invoker?: Record<string, InvokerConfig>;
    Transport?: TransportConfig;
}

export interface ProviderConfig {
    Operation?: Record<string, OperationConfig>;
    Transport?: TransportConfig;
}

export interface WebserviceConfigData {
    Name?: string;
    Description?: string;
    RemoteSystem?: string;
    FrameworkVersion?: string;
    Debugger?: DebuggerConfig;
    Provider?: ProviderConfig;
    Requester?: RequesterConfig;
}

export interface WebserviceConfig {
    ID: number;
    Name: string;
    Config: WebserviceConfigData;
    ValidID: number;
    CreateTime: Date;
    CreateBy: number;
    ChangeTime: Date;
    ChangeBy: number;
}

export interface WebserviceConfigHistory {
    ID: number;
    ConfigID: number;
    Config: string;
    ConfigMD5: string;
    CreateTime: Date;
    CreateBy: number;
    ChangeTime: Date;
    ChangeBy: number;
}

/** Fields a caller supplies when creating or updating a definition. */
export interface WebserviceInput {
    ID?: number;
    Name: string;
    Config: WebserviceConfigData;
    ValidID: number;
}

export const isValid = (ws: WebserviceConfig): boolean => ws.ValidID === VALID_ID_ACTIVE;

export const getInvoker = (ws: WebserviceConfig, name: string): InvokerConfig | undefined => {
    const invokers = ws.Config.Requester?.Invoker;
    if (!invokers || !Object.prototype.hasOwnProperty.call(invokers, name)) {
        return undefined;
    }
    return invokers[name];
};

export const invokerNames = (ws: WebserviceConfig): string[] => Object.keys(ws.Config.Requester?.Invoker ?? {});

export const transportType = (ws: WebserviceConfig): string => ws.Config.Requester?.Transport?.Type ?? '';

export const transportConfig = (ws: WebserviceConfig): TransportHTTPConfig => ws.Config.Requester?.Transport?.Config ?? {};

export const requesterHost = (ws: WebserviceConfig): string => transportConfig(ws).Host ?? '';
