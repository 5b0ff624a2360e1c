import { OutgoingHttpHeaders, RequestOptions } from 'http';
import { CredentialHeaderPolicy, TrustedHostSet } from '../src/credential-header-policy';
import { RetryingRequestExecutor } from '../src/request-executor';
import { ApplicationIdentity, ExecutionResult } from '../src/types';
import { fakeSleep, RecordingLogger, respond, startServer, TestServer } from './helpers';

const identity: ApplicationIdentity = { clientId: 'test-client-id', uid: 'test-app', password: 'test-secret' };
const expectedBasic: string = 'Basic ' + Buffer.from('test-app:test-secret').toString('base64');

describe('TrustedHostSet', (): void => {
    const hosts: TrustedHostSet = new TrustedHostSet(['urs.example.com', '*.example.org', ' ', 'UAT.Example.com']);

    it('should match listed hosts case-insensitively', (): void => {
        expect(hosts.has('urs.example.com')).toBe(true);
        expect(hosts.has('URS.EXAMPLE.COM')).toBe(true);
        expect(hosts.has('uat.example.com')).toBe(true);
    });

    it('should match subdomains of a wildcard entry only', (): void => {
        expect(hosts.has('data.example.org')).toBe(true);
        expect(hosts.has('a.b.example.org')).toBe(true);
        expect(hosts.has('example.org')).toBe(false);
        expect(hosts.has('evilexample.org')).toBe(false);
    });

    it('should not match on a shared suffix or prefix', (): void => {
        expect(hosts.has('urs.example.com.attacker.net')).toBe(false);
        expect(hosts.has('fakeurs.example.com')).toBe(false);
    });

    it('should ignore blank entries', (): void => {
        expect(hosts.size).toBe(3);
    });

    it('should extend a copy with another host', (): void => {
        const extended: TrustedHostSet = hosts.with('data.example.net');

        expect(extended.has('data.example.net')).toBe(true);
        expect(extended.has('data.example.org')).toBe(true);
        expect(hosts.has('data.example.net')).toBe(false);
    });
});

describe('CredentialHeaderPolicy', (): void => {
    const trusted: TrustedHostSet = new TrustedHostSet(['urs.example.com', '*.example.org']);

    describe('authorizationValue', (): void => {
        it('should build a Basic value from the application identity', (): void => {
            expect(CredentialHeaderPolicy.authorizationValue({ scheme: 'basic', appIdentity: identity })).toBe(expectedBasic);
        });

        it('should build a Bearer value', (): void => {
            expect(CredentialHeaderPolicy.authorizationValue({ scheme: 'bearer', token: 'test-token' })).toBe('Bearer test-token');
        });

        it('should combine Bearer and Basic values when both are present', (): void => {
            expect(CredentialHeaderPolicy.authorizationValue({ scheme: 'bearer', token: 'test-token', appIdentity: identity })).toBe(
                `Bearer test-token, ${expectedBasic}`,
            );
        });
    });

    describe('shouldAttachCredential', (): void => {
        const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'bearer', token: 'test-token' });

        it('should attach for trusted hosts', (): void => {
            expect(policy.shouldAttachCredential('https://urs.example.com/oauth/authorize')).toBe(true);
            expect(policy.shouldAttachCredential(new URL('https://data.example.org/granule.nc'))).toBe(true);
        });

        it('should not attach for untrusted hosts', (): void => {
            expect(policy.shouldAttachCredential('https://bucket.s3.amazonaws.com/granule.nc')).toBe(false);
            expect(policy.shouldAttachCredential('https://urs.example.com.attacker.net/')).toBe(false);
        });

        it('should not attach for pre-signed URLs on trusted hosts', (): void => {
            expect(policy.shouldAttachCredential('https://data.example.org/granule.nc?X-Amz-Signature=abc&X-Amz-Expires=60')).toBe(false);
            expect(policy.shouldAttachCredential('https://data.example.org/granule.nc?sig=abc')).toBe(false);
        });

        it('should not attach for an unparsable URL', (): void => {
            expect(policy.shouldAttachCredential('not a url')).toBe(false);
        });
    });

    describe('apply', (): void => {
        it('should strip an existing authorization header for an untrusted host', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'bearer', token: 'test-token' });
            const headers: OutgoingHttpHeaders = { authorization: 'Bearer stale', Authorization: 'Bearer stale', accept: '*/*' };

            policy.apply(headers, 'https://bucket.s3.amazonaws.com/granule.nc');

            expect(headers).toEqual({ accept: '*/*' });
        });

        it('should replace an existing authorization header for a trusted host', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'bearer', token: 'test-token' });
            const headers: OutgoingHttpHeaders = { authorization: 'Bearer stale' };

            policy.apply(headers, 'https://urs.example.com/file');

            expect(headers).toEqual({ Authorization: 'Bearer test-token' });
        });

        it('should attach nothing without an authorization mode', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted);
            const headers: OutgoingHttpHeaders = {};

            policy.apply(headers, 'https://urs.example.com/file');

            expect(headers).toEqual({});
        });
    });

    describe('prepareRequest', (): void => {
        it('should set the header from the hostname and path of the request options', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'basic', appIdentity: identity });
            const options: RequestOptions = { host: 'urs.example.com', path: '/file?x=1', headers: { 'user-agent': 'test-agent/1.0' } };

            policy.prepareRequest(options);

            expect(options.headers).toEqual({ 'user-agent': 'test-agent/1.0', Authorization: expectedBasic });
        });

        it('should strip the header for a pre-signed path', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'basic', appIdentity: identity });
            const options: RequestOptions = { host: 'urs.example.com', path: '/file?X-Amz-Signature=abc', headers: { authorization: 'Bearer stale' } };

            policy.prepareRequest(options);

            expect(options.headers).toEqual({});
        });

        it('should create the headers when the options carry none', (): void => {
            const policy: CredentialHeaderPolicy = new CredentialHeaderPolicy(trusted, { scheme: 'bearer', token: 'test-token' });
            const options: RequestOptions = { host: 'urs.example.com', path: '/' };

            policy.prepareRequest(options);

            expect(options.headers).toEqual({ Authorization: 'Bearer test-token' });
        });
    });

    describe('redirects', (): void => {
        let server: TestServer;
        const executor: RetryingRequestExecutor = new RetryingRequestExecutor(
            {
                trustedHosts: new TrustedHostSet(['127.0.0.1']),
                retry: { maxAttempts: 1, baseDelaySeconds: 2.5, maxDelaySeconds: 90 },
                postUrlLength: 2000,
                requestTimeoutSeconds: 5,
            },
            new RecordingLogger(),
            fakeSleep(),
        );

        beforeEach(async (): Promise<void> => {
            server = await startServer((req, res): void => {
                if (req.url === '/trusted') {
                    respond(res, 302, '', { Location: `http://127.0.0.1:${server.port}/file` });
                } else if (req.url === '/untrusted') {
                    respond(res, 302, '', { Location: `http://127.0.0.2:${server.port}/file` });
                } else if (req.url === '/presigned') {
                    respond(res, 302, '', { Location: `http://127.0.0.1:${server.port}/file?X-Amz-Signature=abc` });
                } else {
                    respond(res, 200, 'content');
                }
            });
        });

        afterEach(async (): Promise<void> => {
            await server.close();
        });

        async function follow(path: string): Promise<void> {
            const result: ExecutionResult = await executor.execute({
                url: `${server.baseUrl}${path}`,
                authorization: { scheme: 'bearer', token: 'test-token' },
            });
            expect(result.kind).toBe('success');
            if (result.kind === 'success') {
                await result.response.readBody();
            }
        }

        it('should keep the header on a redirect within the trusted domain', async (): Promise<void> => {
            await follow('/trusted');

            expect(server.requests.map((req) => req.url)).toEqual(['/trusted', '/file']);
            expect(server.requests[0].headers.authorization).toBe('Bearer test-token');
            expect(server.requests[1].headers.authorization).toBe('Bearer test-token');
        });

        it('should strip the header when a redirect leaves the trusted domain', async (): Promise<void> => {
            await follow('/untrusted');

            expect(server.requests).toHaveLength(2);
            expect(server.requests[0].headers.authorization).toBe('Bearer test-token');
            expect(server.requests[1].headers.host).toBe(`127.0.0.2:${server.port}`);
            expect(server.requests[1].headers.authorization).toBeUndefined();
        });

        it('should strip the header when a redirect targets a pre-signed URL', async (): Promise<void> => {
            await follow('/presigned');

            expect(server.requests).toHaveLength(2);
            expect(server.requests[1].url).toBe('/file?X-Amz-Signature=abc');
            expect(server.requests[1].headers.authorization).toBeUndefined();
        });
    });
});
