export * from './types';
export * from './errors';
export { ConfigUtils, loadConfig } from './config';
export { CoreLogger, redactUrl, redactUrlInText, registerSecret } from './logger';
export { getRetryDelay, sleep, validateRetryPolicy } from './backoff';
export { CredentialHeaderPolicy, TrustedHostSet } from './credential-header-policy';
export { ConsentErrorTranslator } from './consent-error';
export { TokenExchanger } from './token-exchanger';
export { ExecuteRequest, ExecutorSettings, RetryingRequestExecutor } from './request-executor';
export { AuthenticatedDownloader } from './downloader';
export { FileSink } from './file-sink';
export {
    FetchOptions,
    LIBRARY_USER_AGENT,
    REQUEST_ID_PARAM,
    addRequestId,
    buildUserAgent,
    fetchToDirectory,
    filenameForUrl,
    isFileUrl,
    isHttp,
    localhostUrl,
} from './download-utils';
