declare module 'yauzl-promise' {
  import { Readable } from 'stream';

  export interface Entry {
    filename: string;
    openReadStream(): Promise<Readable>;
  }

  export interface ZipFile {
    close(): Promise<void>;
    [Symbol.asyncIterator](): AsyncIterableIterator<Entry>;
  }

  export function open(path: string): Promise<ZipFile>;
}
