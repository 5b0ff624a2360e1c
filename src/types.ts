/**
 * Core type definitions shared by the authenticated download components.
 */

import { OutgoingHttpHeaders } from 'http';
import { HttpClientResponse } from '@actions/http-client';

/**
 * The client-id/secret pair identifying the calling application itself.
 */
export interface ApplicationIdentity {
    clientId: string;
    uid: string;
    password: string;
}

/**
 * Bounds for the retry loop. Delays are expressed in seconds.
 */
export interface RetryPolicy {
    maxAttempts: number;
    baseDelaySeconds: number;
    maxDelaySeconds: number;
}

export interface OAuthSettings {
    host?: string;
    clientId?: string;
    uid?: string;
    password?: string;
    redirectUri?: string;
}

/**
 * Runtime configuration, loaded once per process by {@link loadConfig}.
 */
export interface DownloaderConfig {
    oauth: OAuthSettings;
    trustedHosts: string[];
    retry: RetryPolicy;
    postUrlLength: number;
    requestTimeoutSeconds: number;
    fallbackAuthnEnabled: boolean;
    tokenExchangeEnabled: boolean;
    userAgent: string;
    appName?: string;
    backendHost: string;
}

/**
 * How the Authorization header is built for trusted destinations.
 * A bearer mode carrying an application identity produces the combined
 * `Bearer <token>, Basic <identity>` value used by the authorization endpoint.
 */
export type AuthorizationMode =
    | { scheme: 'bearer'; token: string; appIdentity?: ApplicationIdentity }
    | { scheme: 'basic'; appIdentity: ApplicationIdentity };

export interface ExchangedToken {
    value: string;
    sourceCredential: string;
}

/**
 * Body of the token endpoint response.
 */
export interface TokenResponseData {
    access_token?: string;
    token_type?: string;
    expires_in?: number;
    refresh_token?: string;
    endpoint?: string;
}

export interface ConsentTranslation {
    message: string;
    resolutionUrl: string;
}

/**
 * Form data for a POST request: either an already encoded string or key/value pairs.
 */
export type FormData = string | Record<string, string | string[]>;

/**
 * A single try of a logical request.
 */
export interface RequestAttempt {
    sequence: number;
    url: string;
    method: 'GET' | 'POST';
    headers: OutgoingHttpHeaders;
    body?: string;
}

export type ExecutionResult =
    | { kind: 'success'; response: HttpClientResponse; url: string }
    | { kind: 'permanent-failure'; statusCode: number; body: string }
    | { kind: 'consent-required'; statusCode: number; body: string; consent: ConsentTranslation }
    | { kind: 'exhausted'; statusCode?: number; body?: string; error?: Error };

export type DownloadOutcome =
    | { kind: 'success'; bytesWritten: number; durationMs: number }
    | { kind: 'forbidden'; message: string; statusCode: number }
    | { kind: 'consent-required'; message: string; resolutionUrl: string; statusCode: number }
    | { kind: 'server-failure'; message: string; statusCode?: number };

/**
 * Anything the downloaded bytes can be written to.
 */
export interface DestinationSink {
    write(chunk: Buffer): void | Promise<void>;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface LogRecord {
    level: LogLevel;
    message: string;
    fields?: LogFields;
}

/**
 * Structured log sink. Implementations must never receive raw credential values.
 */
export interface Logger {
    log(record: LogRecord): void;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
