import { OutgoingHttpHeaders, RequestOptions } from 'http';
import { HttpClientResponse } from '@actions/http-client';
import { RequestHandler } from '@actions/http-client/lib/interfaces';
import { ApplicationIdentity, AuthorizationMode } from './types';

// Query parameters that mark a pre-signed object-storage URL
const SIGNED_URL_PARAMS: ReadonlySet<string> = new Set(['x-amz-signature', 'x-amz-credential', 'x-goog-signature', 'signature', 'sig']);

/**
 * The hostnames of the identity provider's domain. Entries match the full hostname,
 * case-insensitively. An entry starting with `*.` matches any subdomain of the rest.
 */
export class TrustedHostSet {
    private readonly entries: readonly string[];
    private readonly exact: ReadonlySet<string>;
    private readonly suffixes: readonly string[];

    constructor(hosts: Iterable<string>) {
        const exact: Set<string> = new Set();
        const suffixes: string[] = [];
        this.entries = Array.from(hosts);
        for (const raw of this.entries) {
            const host: string = raw.trim().toLowerCase();
            if (host === '') {
                continue;
            }
            if (host.startsWith('*.')) {
                suffixes.push(host.substring(1));
            } else {
                exact.add(host);
            }
        }
        this.exact = exact;
        this.suffixes = suffixes;
    }

    public has(hostname: string): boolean {
        const host: string = hostname.toLowerCase();
        if (this.exact.has(host)) {
            return true;
        }
        // suffix keeps its leading dot so "evil-example.com" never matches "*.example.com"
        return this.suffixes.some((suffix) => host.length > suffix.length && host.endsWith(suffix));
    }

    public get size(): number {
        return this.exact.size + this.suffixes.length;
    }

    /**
     * A new set holding these entries plus the given host.
     */
    public with(hostname: string): TrustedHostSet {
        return new TrustedHostSet([...this.entries, hostname]);
    }
}

/**
 * Decides, for every outgoing request and every redirect hop, whether the Authorization
 * header is attached or stripped.
 *
 * The HTTP client calls {@link prepareRequest} before the first request and again before each
 * redirected request, so a header copied forward from a trusted host is removed as soon as the
 * chain leaves the trusted domain or reaches a pre-signed URL.
 */
export class CredentialHeaderPolicy implements RequestHandler {
    constructor(
        private readonly trustedHosts: TrustedHostSet,
        private readonly authorization?: AuthorizationMode,
    ) {}

    public static basicValue(identity: ApplicationIdentity): string {
        return 'Basic ' + Buffer.from(`${identity.uid}:${identity.password}`).toString('base64');
    }

    public static authorizationValue(mode: AuthorizationMode): string {
        if (mode.scheme === 'basic') {
            return CredentialHeaderPolicy.basicValue(mode.appIdentity);
        }
        const values: string[] = [`Bearer ${mode.token}`];
        if (mode.appIdentity) {
            values.push(CredentialHeaderPolicy.basicValue(mode.appIdentity));
        }
        return values.join(', ');
    }

    public static isPresignedUrl(url: URL): boolean {
        for (const name of url.searchParams.keys()) {
            if (SIGNED_URL_PARAMS.has(name.toLowerCase())) {
                return true;
            }
        }
        return false;
    }

    public shouldAttachCredential(targetUrl: string | URL): boolean {
        let url: URL;
        try {
            url = typeof targetUrl === 'string' ? new URL(targetUrl) : targetUrl;
        } catch (e: unknown) {
            return false;
        }
        if (CredentialHeaderPolicy.isPresignedUrl(url)) {
            return false;
        }
        return this.trustedHosts.has(url.hostname);
    }

    /**
     * Sets or removes the Authorization header for a request to the given URL.
     */
    public apply(headers: OutgoingHttpHeaders, targetUrl: string | URL): void {
        for (const name of Object.keys(headers)) {
            if (name.toLowerCase() === 'authorization') {
                delete headers[name];
            }
        }
        if (this.authorization && this.shouldAttachCredential(targetUrl)) {
            headers['Authorization'] = CredentialHeaderPolicy.authorizationValue(this.authorization);
        }
    }

    public prepareRequest(options: RequestOptions): void {
        const headers: OutgoingHttpHeaders = CredentialHeaderPolicy.headersOf(options);
        // The client hands over the bare hostname and the path with its query string.
        // An unparsable target leaves the header stripped.
        const hostname: string = options.hostname ?? options.host ?? '';
        this.apply(headers, `http://${hostname}${options.path ?? '/'}`);
    }

    public canHandleAuthentication(): boolean {
        return false;
    }

    public async handleAuthentication(): Promise<HttpClientResponse> {
        throw new Error('not implemented');
    }

    private static headersOf(options: RequestOptions): OutgoingHttpHeaders {
        const current: OutgoingHttpHeaders | readonly string[] | undefined = options.headers;
        if (current === undefined || isHeaderList(current)) {
            const headers: OutgoingHttpHeaders = {};
            options.headers = headers;
            return headers;
        }
        return current;
    }
}

function isHeaderList(headers: OutgoingHttpHeaders | readonly string[]): headers is readonly string[] {
    return Array.isArray(headers);
}
