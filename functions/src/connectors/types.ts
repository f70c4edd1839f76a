export type FetchFn = typeof fetch;

export interface SourceConnector<T> {
  readonly sourceName: string;
  readonly sourceUrl: string;
  fetchRawEvents(): Promise<T[]>;
}
