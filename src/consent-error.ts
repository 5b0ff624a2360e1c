import { ConsentTranslation } from './types';

/**
 * Recognizes the "usage agreement required" failure body returned by the identity provider:
 * a JSON object carrying both `error_description` and `resolution_url`.
 */
export class ConsentErrorTranslator {
    public static tryTranslate(body: string | undefined): ConsentTranslation | undefined {
        if (!body) {
            return undefined;
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (e: unknown) {
            return undefined;
        }
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            return undefined;
        }
        if ('error_description' in parsed && 'resolution_url' in parsed) {
            const resolutionUrl: string = String(parsed.resolution_url);
            return {
                message: ConsentErrorTranslator.formatMessage(resolutionUrl),
                resolutionUrl,
            };
        }
        return undefined;
    }

    public static formatMessage(resolutionUrl: string): string {
        return `Request could not be completed because you need to agree to the EULA at ${resolutionUrl}`;
    }
}
