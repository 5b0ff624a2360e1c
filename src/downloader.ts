import { TrustedHostSet } from './credential-header-policy';
import { ConsentErrorTranslator } from './consent-error';
import { ConfigurationError } from './errors';
import { CoreLogger, redactUrl } from './logger';
import { RetryingRequestExecutor } from './request-executor';
import { TokenExchanger } from './token-exchanger';
import {
    AuthorizationMode,
    ConsentTranslation,
    DestinationSink,
    DownloaderConfig,
    DownloadOutcome,
    ExchangedToken,
    ExecutionResult,
    FormData,
    Logger,
} from './types';

/**
 * Retrieves a resource into a destination sink, picking the authorization scheme from the
 * configuration and classifying every failure into a {@link DownloadOutcome}.
 *
 * Exception cases that are not outcomes:
 * 1. No credential and fallback authentication disabled (ConfigurationError)
 * 2. Fallback enabled without an application identity (ConfigurationError)
 * 3. The token exchange failed (TokenExchangeError)
 * 4. The caller's signal aborted (CanceledError)
 */
export class AuthenticatedDownloader {
    private readonly config: DownloaderConfig;
    private readonly logger: Logger;
    private readonly executor: RetryingRequestExecutor;
    private readonly exchanger: TokenExchanger;

    constructor(config: DownloaderConfig, logger: Logger = new CoreLogger(), executor?: RetryingRequestExecutor, exchanger?: TokenExchanger) {
        const trustedHosts: TrustedHostSet = new TrustedHostSet(config.trustedHosts);
        this.config = config;
        this.logger = logger;
        this.executor =
            executor ??
            new RetryingRequestExecutor(
                {
                    trustedHosts,
                    retry: config.retry,
                    postUrlLength: config.postUrlLength,
                    requestTimeoutSeconds: config.requestTimeoutSeconds,
                },
                logger,
            );
        this.exchanger = exchanger ?? new TokenExchanger(config.oauth, trustedHosts, config.requestTimeoutSeconds, logger);
    }

    /**
     * Downloads the given URL and writes the response body to the sink.
     *
     * @param url - http(s) URL of the resource
     * @param credential - the user's access token; when absent the fallback Basic identity is used, if enabled
     * @param data - form data; when given the request is a POST
     * @param sink - destination of the downloaded bytes
     * @param userAgent - value of the User-Agent header
     * @param signal - aborts pending retry delays
     */
    public async download(
        url: string,
        credential: string | undefined,
        data: FormData | undefined,
        sink: DestinationSink,
        userAgent?: string,
        signal?: AbortSignal,
    ): Promise<DownloadOutcome> {
        const displayUrl: string = redactUrl(url);
        const authorization: AuthorizationMode = await this.resolveAuthorization(credential, displayUrl);

        const startTime: number = Date.now();
        this.logger.log({ level: 'info', message: `timing.download.start ${displayUrl}` });
        if (data !== undefined) {
            this.logger.log({ level: 'info', message: 'Query parameters supplied, will use POST method.' });
        }

        const result: ExecutionResult = await this.executor.execute({ url, authorization, data, userAgent, signal });
        switch (result.kind) {
            case 'success':
                return await this.writeToSink(result, url, sink, startTime);
            case 'consent-required':
                return this.consentOutcome(result.consent, result.statusCode, result.body);
            case 'permanent-failure': {
                const consent: ConsentTranslation | undefined = ConsentErrorTranslator.tryTranslate(result.body);
                if (consent) {
                    return this.consentOutcome(consent, result.statusCode, result.body);
                }
                const message: string = `Forbidden: Unable to download ${displayUrl}. Will not retry.`;
                this.logger.log({ level: 'info', message: `${message} due to: ${result.body}` });
                return { kind: 'forbidden', message, statusCode: result.statusCode };
            }
            case 'exhausted': {
                const consent: ConsentTranslation | undefined = ConsentErrorTranslator.tryTranslate(result.body);
                if (consent && result.statusCode !== undefined) {
                    return this.consentOutcome(consent, result.statusCode, result.body ?? '');
                }
                const reason: string =
                    result.statusCode !== undefined ? `status code: ${result.statusCode}` : `error: ${result.error?.message ?? 'unknown error'}`;
                const message: string = `Unable to download ${displayUrl} due to ${reason} and all retries exhausted.`;
                // The body stays in the logs, never in the message returned to the user
                this.logger.log({ level: 'error', message, fields: { body: result.body } });
                return { kind: 'server-failure', message, statusCode: result.statusCode };
            }
        }
    }

    private async resolveAuthorization(credential: string | undefined, displayUrl: string): Promise<AuthorizationMode> {
        if (credential) {
            if (!this.config.tokenExchangeEnabled) {
                return { scheme: 'bearer', token: credential };
            }
            const exchanged: ExchangedToken = await this.exchanger.exchange(credential);
            return { scheme: 'bearer', token: exchanged.value };
        }

        if (this.config.fallbackAuthnEnabled) {
            const { clientId, uid, password } = this.config.oauth;
            if (!uid || !password) {
                throw new ConfigurationError('Fallback authentication is enabled, but OAUTH_UID or OAUTH_PASSWORD is not set.');
            }
            this.logger.log({
                level: 'warning',
                message: 'No user access token in request. Fallback authentication enabled: using Basic auth.',
                fields: { url: displayUrl },
            });
            return { scheme: 'basic', appIdentity: { clientId: clientId ?? '', uid, password } };
        }

        throw new ConfigurationError(`Unable to download ${displayUrl}: missing user access token and fallback authentication is not enabled.`);
    }

    private async writeToSink(
        result: Extract<ExecutionResult, { kind: 'success' }>,
        url: string,
        sink: DestinationSink,
        startTime: number,
    ): Promise<DownloadOutcome> {
        let bytesWritten: number = 0;
        try {
            for await (const chunk of result.response.message) {
                const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
                await sink.write(buffer);
                bytesWritten += buffer.length;
            }
        } catch (error) {
            const message: string = `Unable to download ${redactUrl(url)}: transfer failed after ${bytesWritten} bytes`;
            this.logger.log({ level: 'error', message, fields: { error: error instanceof Error ? error.message : String(error) } });
            return { kind: 'server-failure', message };
        }

        const durationMs: number = Date.now() - startTime;
        this.logDownloadPerformance(url, durationMs, bytesWritten);
        return { kind: 'success', bytesWritten, durationMs };
    }

    private consentOutcome(consent: ConsentTranslation, statusCode: number, body: string): DownloadOutcome {
        this.logger.log({ level: 'info', message: `${consent.message} due to: ${body}` });
        return { kind: 'consent-required', message: consent.message, resolutionUrl: consent.resolutionUrl, statusCode };
    }

    /**
     * Logs one performance record for a completed download. Host and path are best effort.
     */
    private logDownloadPerformance(url: string, durationMs: number, size: number): void {
        let host: string = 'Unknown';
        let path: string = '';
        const match: RegExpExecArray | null = /.*:\/\/([^/]+)(.*)/.exec(redactUrl(url));
        if (match) {
            host = match[1];
            path = match[2];
        }
        this.logger.log({ level: 'info', message: 'timing.download.end', fields: { durationMs, host, path, size } });
    }
}
