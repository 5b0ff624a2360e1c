import { OutgoingHttpHeaders } from 'http';
import { HttpClient, HttpClientResponse } from '@actions/http-client';
import { getRetryDelay, sleep, validateRetryPolicy } from './backoff';
import { ConsentErrorTranslator } from './consent-error';
import { CredentialHeaderPolicy, TrustedHostSet } from './credential-header-policy';
import { CanceledError } from './errors';
import { CoreLogger, redactUrl, redactUrlInText } from './logger';
import {
    AuthorizationMode,
    ConsentTranslation,
    ExecutionResult,
    FormData,
    Logger,
    RequestAttempt,
    RetryPolicy,
    Sleeper,
} from './types';

export interface ExecutorSettings {
    trustedHosts: TrustedHostSet;
    retry: RetryPolicy;
    postUrlLength: number;
    requestTimeoutSeconds: number;
}

export interface ExecuteRequest {
    url: string;
    authorization?: AuthorizationMode;
    data?: FormData;
    userAgent?: string;
    signal?: AbortSignal;
}

interface AttemptFailure {
    kind: 'failure';
    statusCode?: number;
    body?: string;
    error?: Error;
}

type AttemptOutcome = { kind: 'success'; response: HttpClientResponse } | AttemptFailure;

/**
 * Issues GET/POST requests through the credential header policy and retries transient failures
 * with exponential backoff. Attempts of one call are strictly sequential; the executor keeps no
 * state between calls.
 */
export class RetryingRequestExecutor {
    public static readonly FORM_CONTENT_TYPE: string = 'application/x-www-form-urlencoded';
    private static readonly PERMANENT_STATUS_CODES: readonly number[] = [401, 403];

    private readonly settings: ExecutorSettings;
    private readonly logger: Logger;
    private readonly sleeper: Sleeper;

    constructor(settings: ExecutorSettings, logger: Logger = new CoreLogger(), sleeper: Sleeper = sleep) {
        validateRetryPolicy(settings.retry);
        this.settings = settings;
        this.logger = logger;
        this.sleeper = sleeper;
    }

    /**
     * Encodes form data as `application/x-www-form-urlencoded`. Strings are taken as already encoded.
     */
    public static encodeForm(data: FormData): string {
        if (typeof data === 'string') {
            return data;
        }
        const params: URLSearchParams = new URLSearchParams();
        for (const [key, value] of Object.entries(data)) {
            for (const item of Array.isArray(value) ? value : [value]) {
                params.append(key, item);
            }
        }
        return params.toString();
    }

    /**
     * Moves the query string of an overly long URL into a form body, once, before the first attempt.
     * @returns the URL to request and the body to send, if any
     */
    public rewriteLongUrl(url: string, data?: FormData): { url: string; body?: string } {
        if (data !== undefined) {
            return { url, body: RetryingRequestExecutor.encodeForm(data) };
        }
        if (url.length <= this.settings.postUrlLength) {
            return { url };
        }
        const parsed: URL = new URL(url);
        return {
            url: `${parsed.protocol}//${parsed.host}${parsed.pathname}`,
            body: parsed.search.replace(/^\?/, ''),
        };
    }

    public async execute(request: ExecuteRequest): Promise<ExecutionResult> {
        const policy: RetryPolicy = validateRetryPolicy(this.settings.retry);
        const target: { url: string; body?: string } = this.rewriteLongUrl(request.url, request.data);
        const client: HttpClient = this.createClient(request, target.url);
        const displayUrl: string = redactUrl(target.url);
        if (target.url !== request.url && request.data === undefined) {
            this.logger.log({
                level: 'info',
                message: 'URL exceeds the configured length, submitting the query string via POST',
                fields: { url: displayUrl, length: request.url.length },
            });
        }

        let last: AttemptFailure = { kind: 'failure' };
        for (let sequence: number = 1; sequence <= policy.maxAttempts; sequence++) {
            if (request.signal?.aborted) {
                throw new CanceledError(`Canceled before attempt ${sequence} for ${displayUrl}`);
            }
            const attempt: RequestAttempt = {
                sequence,
                url: target.url,
                method: target.body === undefined ? 'GET' : 'POST',
                headers: target.body === undefined ? {} : { 'Content-Type': RetryingRequestExecutor.FORM_CONTENT_TYPE },
                body: target.body,
            };
            const outcome: AttemptOutcome = await this.send(client, attempt);
            if (outcome.kind === 'success') {
                this.logAttempt(attempt, policy, 'success', outcome.response.message.statusCode);
                return { kind: 'success', response: outcome.response, url: target.url };
            }
            last = outcome;

            const consent: ConsentTranslation | undefined = ConsentErrorTranslator.tryTranslate(last.body);
            if (consent && last.statusCode !== undefined) {
                this.logAttempt(attempt, policy, 'consent-required', last.statusCode);
                return { kind: 'consent-required', statusCode: last.statusCode, body: last.body ?? '', consent };
            }

            if (last.statusCode !== undefined && RetryingRequestExecutor.PERMANENT_STATUS_CODES.includes(last.statusCode)) {
                this.logAttempt(attempt, policy, 'permanent-failure', last.statusCode);
                return { kind: 'permanent-failure', statusCode: last.statusCode, body: last.body ?? '' };
            }

            if (sequence < policy.maxAttempts) {
                const delaySeconds: number = getRetryDelay(sequence, policy);
                this.logAttempt(attempt, policy, 'retry-scheduled', last.statusCode, last.error, delaySeconds);
                await this.sleeper(delaySeconds * 1000, request.signal);
            } else {
                this.logAttempt(attempt, policy, 'retries-exhausted', last.statusCode, last.error);
            }
        }

        return { kind: 'exhausted', statusCode: last.statusCode, body: last.body, error: last.error };
    }

    /**
     * Bearer credentials only go to trusted hosts. The Basic application identity of fallback
     * authentication also goes to the host of the requested URL; redirects away from that host or
     * to pre-signed URLs still drop it.
     */
    private createClient(request: ExecuteRequest, targetUrl: string): HttpClient {
        const hostname: string | undefined = RetryingRequestExecutor.hostnameOf(targetUrl);
        const trustedHosts: TrustedHostSet =
            request.authorization?.scheme === 'basic' && hostname ? this.settings.trustedHosts.with(hostname) : this.settings.trustedHosts;
        const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trustedHosts, request.authorization);
        return new HttpClient(request.userAgent, [policy], {
            allowRetries: false,
            allowRedirects: true,
            socketTimeout: this.settings.requestTimeoutSeconds * 1000,
        });
    }

    private static hostnameOf(url: string): string | undefined {
        try {
            return new URL(url).hostname;
        } catch (e: unknown) {
            return undefined;
        }
    }

    private async send(client: HttpClient, attempt: RequestAttempt): Promise<AttemptOutcome> {
        const headers: OutgoingHttpHeaders = { ...attempt.headers };
        let response: HttpClientResponse;
        try {
            response =
                attempt.method === 'GET'
                    ? await client.get(attempt.url, headers)
                    : await client.post(attempt.url, attempt.body ?? '', headers);
        } catch (error) {
            return { kind: 'failure', error: RetryingRequestExecutor.redactError(error, attempt.url) };
        }

        const statusCode: number = response.message.statusCode ?? 0;
        if (statusCode >= 200 && statusCode < 300) {
            return { kind: 'success', response };
        }
        try {
            const body: string = await response.readBody();
            return { kind: 'failure', statusCode, body };
        } catch (error) {
            return { kind: 'failure', statusCode, error: RetryingRequestExecutor.redactError(error, attempt.url) };
        }
    }

    // The client quotes the request path, query string included, in timeout and socket errors
    private static redactError(error: unknown, url: string): Error {
        const message: string = error instanceof Error ? error.message : String(error);
        const redacted: Error = new Error(redactUrlInText(message, url));
        if (error instanceof Error) {
            redacted.name = error.name;
        }
        return redacted;
    }

    private logAttempt(
        attempt: RequestAttempt,
        policy: RetryPolicy,
        outcome: string,
        statusCode?: number,
        error?: Error,
        delaySeconds?: number,
    ): void {
        this.logger.log({
            level: outcome === 'success' ? 'info' : outcome === 'retries-exhausted' ? 'error' : 'warning',
            message: `Download attempt ${attempt.sequence}/${policy.maxAttempts}: ${outcome}`,
            fields: {
                url: redactUrl(attempt.url),
                method: attempt.method,
                attempt: attempt.sequence,
                outcome,
                statusCode,
                error: error?.message,
                retryInSeconds: delaySeconds,
            },
        });
    }
}
