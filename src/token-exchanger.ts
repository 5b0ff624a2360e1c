/**
 * Converts a user-held access token into a token usable by the calling application,
 * through the identity provider's authorization code flow.
 */

import { HttpClient, HttpClientResponse } from '@actions/http-client';
import { CredentialHeaderPolicy, TrustedHostSet } from './credential-header-policy';
import { ConfigurationError, TokenExchangeError } from './errors';
import { CoreLogger, redactUrlInText, registerSecret } from './logger';
import { ApplicationIdentity, AuthorizationMode, ExchangedToken, Logger, OAuthSettings, TokenResponseData } from './types';

interface ResolvedOAuthSettings {
    host: string;
    redirectUri: string;
    identity: ApplicationIdentity;
}

export class TokenExchanger {
    public static readonly AUTHORIZE_PATH: string = '/oauth/authorize';
    public static readonly TOKEN_PATH: string = '/oauth/token';

    // Process-lifetime cache, keyed by the user's credential. Pending exchanges are shared so
    // concurrent callers for the same credential trigger a single exchange. No eviction.
    private static readonly cache: Map<string, Promise<ExchangedToken>> = new Map();

    private readonly settings: OAuthSettings;
    private readonly trustedHosts: TrustedHostSet;
    private readonly requestTimeoutSeconds: number;
    private readonly logger: Logger;

    constructor(settings: OAuthSettings, trustedHosts: TrustedHostSet, requestTimeoutSeconds: number, logger: Logger = new CoreLogger()) {
        this.settings = settings;
        this.trustedHosts = trustedHosts;
        this.requestTimeoutSeconds = requestTimeoutSeconds;
        this.logger = logger;
    }

    public static clearCache(): void {
        TokenExchanger.cache.clear();
    }

    public static get cacheSize(): number {
        return TokenExchanger.cache.size;
    }

    /**
     * Returns the application token for the given user credential, exchanging it on first use.
     * @throws ConfigurationError if the OAuth settings are incomplete
     * @throws TokenExchangeError if the identity provider did not answer with the expected redirect or token
     */
    public async exchange(userCredential: string): Promise<ExchangedToken> {
        const cached: Promise<ExchangedToken> | undefined = TokenExchanger.cache.get(userCredential);
        if (cached) {
            this.logger.log({ level: 'debug', message: 'Using cached application token' });
            return cached;
        }

        const pending: Promise<ExchangedToken> = this.requestToken(userCredential);
        TokenExchanger.cache.set(userCredential, pending);
        try {
            return await pending;
        } catch (error) {
            // Failed exchanges are not cached, the next call tries again
            if (TokenExchanger.cache.get(userCredential) === pending) {
                TokenExchanger.cache.delete(userCredential);
            }
            throw error;
        }
    }

    private async requestToken(userCredential: string): Promise<ExchangedToken> {
        const settings: ResolvedOAuthSettings = this.resolveSettings();
        const code: string = await this.requestAuthorizationCode(settings, userCredential);
        const token: string = await this.redeemAuthorizationCode(settings, code);
        registerSecret(token);
        return { value: token, sourceCredential: userCredential };
    }

    /**
     * Step 1: present the user's token together with the application identity and harvest the
     * `code` from the redirect, which is read as data and never followed.
     */
    private async requestAuthorizationCode(settings: ResolvedOAuthSettings, userCredential: string): Promise<string> {
        const params: URLSearchParams = new URLSearchParams({
            response_type: 'code',
            client_id: settings.identity.clientId,
            redirect_uri: settings.redirectUri,
        });
        const url: string = `${settings.host}${TokenExchanger.AUTHORIZE_PATH}?${params.toString()}`;
        const client: HttpClient = this.createClient({ scheme: 'bearer', token: userCredential, appIdentity: settings.identity });

        this.logger.log({ level: 'debug', message: 'Requesting authorization code', fields: { host: settings.host } });
        let response: HttpClientResponse;
        try {
            response = await client.get(url);
            await response.readBody();
        } catch (error) {
            throw new TokenExchangeError(`Unable to acquire authorization code from user access token: ${TokenExchanger.describe(error, url)}`);
        }

        const statusCode: number = response.message.statusCode ?? 0;
        // Node lowercases incoming header names
        const location: string | undefined = response.message.headers.location;
        if (statusCode < 300 || statusCode >= 400 || !location) {
            throw new TokenExchangeError(
                `Unable to acquire authorization code from user access token: expected a redirect, got status ${statusCode}`,
                statusCode,
            );
        }

        let code: string | null;
        try {
            code = new URL(location, url).searchParams.get('code');
        } catch (e: unknown) {
            code = null;
        }
        if (!code) {
            throw new TokenExchangeError('Unable to acquire authorization code from user access token: no code in redirect', statusCode);
        }
        return code;
    }

    /**
     * Step 2: redeem the code with the application identity only. Not retried.
     */
    private async redeemAuthorizationCode(settings: ResolvedOAuthSettings, code: string): Promise<string> {
        const url: string = `${settings.host}${TokenExchanger.TOKEN_PATH}`;
        const body: string = new URLSearchParams({
            grant_type: 'authorization_code',
            code,
            redirect_uri: settings.redirectUri,
        }).toString();
        const client: HttpClient = this.createClient({ scheme: 'basic', appIdentity: settings.identity });

        this.logger.log({ level: 'debug', message: 'Redeeming authorization code', fields: { host: settings.host } });
        let response: HttpClientResponse;
        let responseBody: string;
        try {
            response = await client.post(url, body, { 'Content-Type': 'application/x-www-form-urlencoded' });
            responseBody = await response.readBody();
        } catch (error) {
            throw new TokenExchangeError(`Unable to acquire application token: ${TokenExchanger.describe(error, url)}`);
        }

        const statusCode: number = response.message.statusCode ?? 0;
        if (statusCode < 200 || statusCode >= 300) {
            throw new TokenExchangeError(`Unable to acquire application token: token endpoint returned status ${statusCode}`, statusCode);
        }

        let tokenData: TokenResponseData;
        try {
            tokenData = JSON.parse(responseBody);
        } catch (e: unknown) {
            throw new TokenExchangeError('Unable to acquire application token: token endpoint response is not JSON', statusCode);
        }
        if (!tokenData || typeof tokenData.access_token !== 'string' || tokenData.access_token === '') {
            throw new TokenExchangeError('Unable to acquire application token: access token not found in the response', statusCode);
        }
        return tokenData.access_token;
    }

    private createClient(authorization: AuthorizationMode): HttpClient {
        return new HttpClient(undefined, [new CredentialHeaderPolicy(this.trustedHosts, authorization)], {
            allowRedirects: false,
            allowRetries: false,
            socketTimeout: this.requestTimeoutSeconds * 1000,
        });
    }

    private resolveSettings(): ResolvedOAuthSettings {
        const { host, clientId, uid, password, redirectUri } = this.settings;
        if (!host || !clientId || !uid || !password || !redirectUri) {
            throw new ConfigurationError(
                'Token exchange requires OAUTH_HOST, OAUTH_CLIENT_ID, OAUTH_UID, OAUTH_PASSWORD and OAUTH_REDIRECT_URI to be set',
            );
        }
        return {
            host: host.replace(/\/$/, ''),
            redirectUri,
            identity: { clientId, uid, password },
        };
    }

    private static describe(error: unknown, url: string): string {
        return redactUrlInText(error instanceof Error ? error.message : String(error), url);
    }
}
