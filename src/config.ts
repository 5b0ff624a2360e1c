/**
 * Configuration for the download components, read once per process from an optional YAML
 * file and the environment. Environment variables win over the file.
 */

import { existsSync, promises as fs } from 'fs';
import path from 'path';
import { load } from 'js-yaml';
import { validateRetryPolicy } from './backoff';
import { ConfigurationError } from './errors';
import { registerSecret } from './logger';
import { DownloaderConfig, OAuthSettings, RetryPolicy } from './types';

type Env = Record<string, string | undefined>;

// Config file layout:
// oauth:
//   host: https://urs.example.com
//   clientId: <application client id>
// trustedHosts:
//   - urs.example.com
// retry:
//   maxAttempts: 5
interface FileConfig {
    oauth?: OAuthSettings;
    trustedHosts?: string[];
    retry?: Partial<RetryPolicy>;
    postUrlLength?: number;
    requestTimeoutSeconds?: number;
    fallbackAuthnEnabled?: boolean;
    tokenExchangeEnabled?: boolean;
}

export class ConfigUtils {
    // Config file directory name
    public static readonly CONFIG_DIR_NAME: string = '.federated-download';
    // Config file name
    public static readonly CONFIG_FILE_NAME: string = 'config.yml';

    public static readonly DEFAULT_RETRY_POLICY: RetryPolicy = {
        maxAttempts: 5,
        baseDelaySeconds: 2.5,
        maxDelaySeconds: 90,
    };
    public static readonly DEFAULT_POST_URL_LENGTH: number = 2000;
    // Per-request socket timeout, not a limit on the whole transfer
    public static readonly DEFAULT_REQUEST_TIMEOUT_SECONDS: number = 60;
    public static readonly DEFAULT_USER_AGENT: string = 'federated-download (unknown version)';

    /**
     * Builds the configuration from the config file and the environment variables.
     * @throws ConfigurationError if a value is malformed
     */
    public static async loadConfig(env: Env = process.env): Promise<DownloaderConfig> {
        const configFilePath: string = env.DOWNLOADER_CONFIG_FILE || path.join(this.CONFIG_DIR_NAME, this.CONFIG_FILE_NAME);
        const fileConfig: FileConfig = await this.readConfigFile(configFilePath);

        const oauth: OAuthSettings = {
            host: this.str(env.OAUTH_HOST) ?? fileConfig.oauth?.host,
            clientId: this.str(env.OAUTH_CLIENT_ID) ?? fileConfig.oauth?.clientId,
            uid: this.str(env.OAUTH_UID) ?? fileConfig.oauth?.uid,
            password: this.str(env.OAUTH_PASSWORD) ?? fileConfig.oauth?.password,
            redirectUri: this.str(env.OAUTH_REDIRECT_URI) ?? fileConfig.oauth?.redirectUri,
        };
        // Mark the credentials as secrets to prevent them from being printed in the logs
        registerSecret(oauth.password);

        const retry: RetryPolicy = validateRetryPolicy({
            maxAttempts: this.num('MAX_DOWNLOAD_RETRIES', env.MAX_DOWNLOAD_RETRIES) ?? fileConfig.retry?.maxAttempts ?? this.DEFAULT_RETRY_POLICY.maxAttempts,
            baseDelaySeconds:
                this.num('RETRY_BASE_DELAY_SECS', env.RETRY_BASE_DELAY_SECS) ??
                fileConfig.retry?.baseDelaySeconds ??
                this.DEFAULT_RETRY_POLICY.baseDelaySeconds,
            maxDelaySeconds:
                this.num('MAX_RETRY_DELAY_SECS', env.MAX_RETRY_DELAY_SECS) ??
                fileConfig.retry?.maxDelaySeconds ??
                this.DEFAULT_RETRY_POLICY.maxDelaySeconds,
        });

        const postUrlLength: number = this.num('POST_URL_LENGTH', env.POST_URL_LENGTH) ?? fileConfig.postUrlLength ?? this.DEFAULT_POST_URL_LENGTH;
        const requestTimeoutSeconds: number =
            this.num('REQUEST_TIMEOUT_SECS', env.REQUEST_TIMEOUT_SECS) ?? fileConfig.requestTimeoutSeconds ?? this.DEFAULT_REQUEST_TIMEOUT_SECONDS;
        if (postUrlLength < 1) {
            throw new ConfigurationError(`POST_URL_LENGTH must be positive, got ${postUrlLength}`);
        }
        if (requestTimeoutSeconds <= 0) {
            throw new ConfigurationError(`REQUEST_TIMEOUT_SECS must be positive, got ${requestTimeoutSeconds}`);
        }

        const backendHost: string = this.str(env.BACKEND_HOST) ?? 'localhost';
        return {
            oauth,
            trustedHosts: this.trustedHosts(env.TRUSTED_HOSTS, fileConfig.trustedHosts, oauth.host),
            retry,
            postUrlLength,
            requestTimeoutSeconds,
            fallbackAuthnEnabled: this.bool(env.FALLBACK_AUTHN_ENABLED) ?? fileConfig.fallbackAuthnEnabled ?? false,
            tokenExchangeEnabled: this.bool(env.TOKEN_EXCHANGE_ENABLED) ?? fileConfig.tokenExchangeEnabled ?? false,
            userAgent: this.str(env.USER_AGENT) ?? this.DEFAULT_USER_AGENT,
            appName: this.str(env.APP_NAME),
            backendHost: this.str(env.LOCALSTACK_HOST) ?? backendHost,
        };
    }

    /**
     * Trusted hosts from the environment (`;` or `,` separated), else the config file,
     * else the identity provider's own hostname.
     */
    public static trustedHosts(fromEnv: string | undefined, fromFile: string[] | undefined, oauthHost: string | undefined): string[] {
        const listed: string = fromEnv?.trim() ?? '';
        if (listed !== '') {
            return listed
                .split(/[;,]/)
                .map((host) => host.trim())
                .filter((host) => host !== '');
        }
        if (fromFile && fromFile.length > 0) {
            return fromFile;
        }
        if (!oauthHost) {
            return [];
        }
        try {
            return [new URL(oauthHost).hostname];
        } catch (e: unknown) {
            throw new ConfigurationError(`OAUTH_HOST is not a valid URL: ${oauthHost}`);
        }
    }

    private static async readConfigFile(configFilePath: string): Promise<FileConfig> {
        if (!existsSync(configFilePath)) {
            return {};
        }
        const content: string = await fs.readFile(configFilePath, 'utf-8');
        let parsed: unknown;
        try {
            parsed = load(content);
        } catch (error) {
            throw new ConfigurationError(`Config file ${configFilePath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
        }
        if (parsed === undefined || parsed === null) {
            return {};
        }
        const root: Map<string, unknown> | undefined = this.mapping(parsed);
        if (!root) {
            throw new ConfigurationError(`Config file ${configFilePath} must contain a mapping`);
        }
        const oauth: Map<string, unknown> = this.mapping(root.get('oauth')) ?? new Map();
        const retry: Map<string, unknown> = this.mapping(root.get('retry')) ?? new Map();
        const trustedHosts: unknown = root.get('trustedHosts');
        return {
            oauth: {
                host: this.optional('oauth.host', oauth.get('host'), 'string'),
                clientId: this.optional('oauth.clientId', oauth.get('clientId'), 'string'),
                uid: this.optional('oauth.uid', oauth.get('uid'), 'string'),
                password: this.optional('oauth.password', oauth.get('password'), 'string'),
                redirectUri: this.optional('oauth.redirectUri', oauth.get('redirectUri'), 'string'),
            },
            trustedHosts: Array.isArray(trustedHosts) ? trustedHosts.map((host: unknown) => String(host)) : undefined,
            retry: {
                maxAttempts: this.optional('retry.maxAttempts', retry.get('maxAttempts'), 'number'),
                baseDelaySeconds: this.optional('retry.baseDelaySeconds', retry.get('baseDelaySeconds'), 'number'),
                maxDelaySeconds: this.optional('retry.maxDelaySeconds', retry.get('maxDelaySeconds'), 'number'),
            },
            postUrlLength: this.optional('postUrlLength', root.get('postUrlLength'), 'number'),
            requestTimeoutSeconds: this.optional('requestTimeoutSeconds', root.get('requestTimeoutSeconds'), 'number'),
            fallbackAuthnEnabled: this.optional('fallbackAuthnEnabled', root.get('fallbackAuthnEnabled'), 'boolean'),
            tokenExchangeEnabled: this.optional('tokenExchangeEnabled', root.get('tokenExchangeEnabled'), 'boolean'),
        };
    }

    private static mapping(value: unknown): Map<string, unknown> | undefined {
        if (typeof value !== 'object' || value === null || Array.isArray(value)) {
            return undefined;
        }
        return new Map(Object.entries(value));
    }

    private static optional(key: string, value: unknown, type: 'string'): string | undefined;
    private static optional(key: string, value: unknown, type: 'number'): number | undefined;
    private static optional(key: string, value: unknown, type: 'boolean'): boolean | undefined;
    private static optional(key: string, value: unknown, type: 'string' | 'number' | 'boolean'): string | number | boolean | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value === 'string' && type === 'string') {
            return value;
        }
        if (typeof value === 'number' && type === 'number') {
            return value;
        }
        if (typeof value === 'boolean' && type === 'boolean') {
            return value;
        }
        throw new ConfigurationError(`Config file value '${key}' must be a ${type}`);
    }

    // Strips surrounding double quotes, the way container environments sometimes pass values
    private static str(value: string | undefined): string | undefined {
        if (value === undefined) {
            return undefined;
        }
        const stripped: string = value.replace(/^"+|"+$/g, '');
        return stripped === '' ? undefined : stripped;
    }

    private static bool(value: string | undefined): boolean | undefined {
        const stripped: string | undefined = this.str(value);
        return stripped === undefined ? undefined : stripped.toLowerCase() === 'true';
    }

    private static num(name: string, value: string | undefined): number | undefined {
        const stripped: string | undefined = this.str(value);
        if (stripped === undefined) {
            return undefined;
        }
        const parsed: number = Number(stripped);
        if (!Number.isFinite(parsed)) {
            throw new ConfigurationError(`${name} must be a number, got '${stripped}'`);
        }
        return parsed;
    }
}

export function loadConfig(env?: Env): Promise<DownloaderConfig> {
    return ConfigUtils.loadConfig(env);
}
