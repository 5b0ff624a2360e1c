import http, { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { DestinationSink, DownloaderConfig, Logger, LogRecord } from '../src/types';

export interface RecordedRequest {
    method: string;
    url: string;
    headers: IncomingHttpHeaders;
    body: string;
}

export interface TestServer {
    baseUrl: string;
    port: number;
    requests: RecordedRequest[];
    close(): Promise<void>;
}

type Handler = (req: RecordedRequest, res: ServerResponse) => void;

/**
 * Starts an HTTP server on an ephemeral loopback port. Every request is recorded with its body
 * before the handler runs.
 */
export async function startServer(handler: Handler): Promise<TestServer> {
    const requests: RecordedRequest[] = [];
    const server: http.Server = http.createServer((req: IncomingMessage, res: ServerResponse) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
            const recorded: RecordedRequest = {
                method: req.method ?? '',
                url: req.url ?? '',
                headers: req.headers,
                body: Buffer.concat(chunks).toString('utf8'),
            };
            requests.push(recorded);
            handler(recorded, res);
        });
    });
    // Listening on all interfaces lets tests reach the same server under a second loopback address
    const address: AddressInfo = await new Promise<AddressInfo>((resolve, reject) => {
        server.listen(0, () => {
            const info: string | AddressInfo | null = server.address();
            if (info === null || typeof info === 'string') {
                reject(new Error('Server is not listening on a TCP port'));
                return;
            }
            resolve(info);
        });
    });
    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        port: address.port,
        requests,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((error) => (error ? reject(error) : resolve()));
            }),
    };
}

export function respond(res: ServerResponse, statusCode: number, body: string = '', headers: Record<string, string> = {}): void {
    res.writeHead(statusCode, headers);
    res.end(body);
}

export class RecordingLogger implements Logger {
    public readonly records: LogRecord[] = [];

    public log(record: LogRecord): void {
        this.records.push(record);
    }

    public messages(): string[] {
        return this.records.map((record) => record.message);
    }

    public find(message: string): LogRecord[] {
        return this.records.filter((record) => record.message === message);
    }
}

export class MemorySink implements DestinationSink {
    public readonly chunks: Buffer[] = [];

    public write(chunk: Buffer): void {
        this.chunks.push(chunk);
    }

    public text(): string {
        return Buffer.concat(this.chunks).toString('utf8');
    }
}

export function fakeSleep(): jest.Mock<Promise<void>, [number, AbortSignal?]> {
    return jest.fn<Promise<void>, [number, AbortSignal?]>(async (): Promise<void> => undefined);
}

export function testConfig(overrides: Partial<DownloaderConfig> = {}): DownloaderConfig {
    return {
        oauth: {
            host: 'http://127.0.0.1',
            clientId: 'test-client-id',
            uid: 'test-app',
            password: 'test-secret',
            redirectUri: 'https://app.example.com/oauth2/redirect',
        },
        trustedHosts: ['127.0.0.1'],
        retry: { maxAttempts: 3, baseDelaySeconds: 2.5, maxDelaySeconds: 90 },
        postUrlLength: 2000,
        requestTimeoutSeconds: 5,
        fallbackAuthnEnabled: false,
        tokenExchangeEnabled: false,
        userAgent: 'test-agent/1.0',
        backendHost: 'localhost',
        ...overrides,
    };
}
