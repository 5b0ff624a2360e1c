import * as core from '@actions/core';
import { LogFields, Logger, LogRecord } from './types';

// Query parameter names whose values never reach the logs
const SECRET_PARAM_PATTERN: RegExp = /password|secret|key|token|auth|signature|credential|^sig$/i;

/**
 * Logger that writes through the runner's log commands.
 * Fields are appended to the message as a JSON object.
 */
export class CoreLogger implements Logger {
    public log(record: LogRecord): void {
        const line: string = CoreLogger.format(record.message, record.fields);
        switch (record.level) {
            case 'debug':
                core.debug(line);
                break;
            case 'info':
                core.info(line);
                break;
            case 'warning':
                core.warning(line);
                break;
            case 'error':
                core.error(line);
                break;
        }
    }

    public static format(message: string, fields?: LogFields): string {
        if (!fields) {
            return message;
        }
        const defined: LogFields = Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
        if (Object.keys(defined).length === 0) {
            return message;
        }
        return `${message} ${JSON.stringify(defined)}`;
    }
}

/**
 * Marks a value as secret so the runner masks it in any output.
 */
export function registerSecret(value: string | undefined): void {
    if (value) {
        core.setSecret(value);
    }
}

/**
 * Returns the URL with userinfo removed and secret-looking query values masked.
 * Input that does not parse as a URL is returned with its query string dropped.
 */
export function redactUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (e: unknown) {
        return url.split('?')[0];
    }
    parsed.username = '';
    parsed.password = '';
    for (const name of Array.from(new Set(parsed.searchParams.keys()))) {
        if (SECRET_PARAM_PATTERN.test(name)) {
            parsed.searchParams.set(name, '***');
        }
    }
    return parsed.toString();
}

/**
 * Replaces the URL, or its path and query string, wherever it appears in the text with the
 * redacted form. Transport errors quote the request path verbatim.
 */
export function redactUrlInText(text: string, url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (e: unknown) {
        return url === '' ? text : text.split(url).join(redactUrl(url));
    }
    const redacted: URL = new URL(redactUrl(url));
    const replacements: [string, string][] = [
        [url, redacted.toString()],
        [parsed.toString(), redacted.toString()],
        [parsed.pathname + parsed.search, redacted.pathname + redacted.search],
    ];
    let result: string = text;
    for (const [raw, masked] of replacements) {
        if (raw !== masked) {
            result = result.split(raw).join(masked);
        }
    }
    return result;
}
