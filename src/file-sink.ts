import { FileHandle, open } from 'fs/promises';
import { DestinationSink } from './types';

/**
 * Destination sink writing to a local file opened for binary write.
 */
export class FileSink implements DestinationSink {
    private constructor(
        public readonly path: string,
        private readonly handle: FileHandle,
    ) {}

    public static async open(filePath: string): Promise<FileSink> {
        return new FileSink(filePath, await open(filePath, 'w'));
    }

    public async write(chunk: Buffer): Promise<void> {
        await this.handle.write(chunk);
    }

    public async close(): Promise<void> {
        await this.handle.close();
    }
}
