/**
 * Helpers for the file-retrieval layer that sits in front of the authenticated downloader:
 * URL classification and rewriting, user agent building and downloads into a directory.
 */

import { createHash } from 'crypto';
import { existsSync, promises as fs } from 'fs';
import path from 'path';
import { AuthenticatedDownloader } from './downloader';
import { DownloadError, outcomeToError } from './errors';
import { FileSink } from './file-sink';
import { redactUrl } from './logger';
import { DownloaderConfig, DownloadOutcome, FormData, Logger } from './types';

// eslint-disable-next-line @typescript-eslint/no-var-requires
const packageJson: { version: string } = require('../package.json');

export const LIBRARY_USER_AGENT: string = 'federated-download/' + packageJson.version;

// Query parameter used by the backend to correlate downloads with the originating request
export const REQUEST_ID_PARAM: string = 'A-api-request-uuid';

export interface FetchOptions {
    config: DownloaderConfig;
    downloader: AuthenticatedDownloader;
    logger: Logger;
    credential?: string;
    data?: FormData;
    requestId?: string;
    signal?: AbortSignal;
}

export function isHttp(url: string | undefined): boolean {
    if (!url) {
        return false;
    }
    return /^https?:\/\//i.test(url);
}

export function isFileUrl(url: string | undefined): boolean {
    return url !== undefined && url.startsWith('file://');
}

/**
 * Replaces `localhost` with the given hostname so local development URLs resolve from
 * inside a container.
 */
export function localhostUrl(url: string, localHostname: string): string {
    return url.replaceAll('localhost', localHostname);
}

/**
 * Adds, or replaces, the request id query parameter on an http(s) URL.
 */
export function addRequestId(url: string, requestId?: string): string {
    if (!requestId || !isHttp(url)) {
        return url;
    }
    const parsed: URL = new URL(url);
    parsed.searchParams.set(REQUEST_ID_PARAM, requestId);
    return parsed.toString();
}

/**
 * Builds the User-Agent value: the upstream user agent, this library and the service name.
 * E.g. `harvester/1.0 (prod) federated-download/1.0.0 (subsetter)`
 */
export function buildUserAgent(config: DownloaderConfig): string {
    let userAgent: string = `${config.userAgent} ${LIBRARY_USER_AGENT}`;
    if (config.appName) {
        userAgent += ` (${config.appName})`;
    }
    return userAgent;
}

/**
 * The local file for a URL: the sha256 hex digest of the URL, keeping the extension of its path.
 */
export function filenameForUrl(directory: string, url: string): string {
    let urlPath: string;
    try {
        urlPath = new URL(url).pathname;
    } catch (e: unknown) {
        urlPath = url;
    }
    const digest: string = createHash('sha256').update(url, 'utf8').digest('hex');
    return path.join(directory, digest + path.extname(urlPath));
}

/**
 * Retrieves the URL into the directory and returns the local file path.
 * `file://` URLs are returned as paths; http(s) URLs go through the authenticated downloader.
 * A file already present for the URL is reused.
 *
 * @throws ForbiddenError if access was refused, including a required usage agreement
 * @throws ServerError if the download failed after all retries
 * @throws DownloadError if the URL scheme is not supported
 */
export async function fetchToDirectory(url: string, directory: string, options: FetchOptions): Promise<string> {
    if (isFileUrl(url)) {
        return url.replace('file://', '');
    }

    const source: string = localhostUrl(url, options.config.backendHost);
    if (!isHttp(source)) {
        const message: string = `Unable to download a url of unknown type: ${redactUrl(url)}`;
        options.logger.log({ level: 'error', message });
        throw new DownloadError(message);
    }

    const destination: string = filenameForUrl(directory, url);
    if (existsSync(destination)) {
        return destination;
    }

    const sink: FileSink = await FileSink.open(destination);
    let outcome: DownloadOutcome;
    try {
        outcome = await options.downloader.download(
            addRequestId(source, options.requestId),
            options.credential,
            options.data,
            sink,
            buildUserAgent(options.config),
            options.signal,
        );
    } catch (error) {
        await sink.close();
        await fs.rm(destination, { force: true });
        throw error;
    }
    await sink.close();

    if (outcome.kind !== 'success') {
        await fs.rm(destination, { force: true });
        throw outcomeToError(outcome);
    }
    return destination;
}
