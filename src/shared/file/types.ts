export type SourceFormat = 'pdf';

/** A file path, raw bytes, or bytes with the name they were uploaded under. */
export type SourceInput = string | Uint8Array | NamedBytes;

export interface NamedBytes {
  bytes: Uint8Array;
  fileName: string;
}

export interface ResolvedSource {
  format: SourceFormat;
  bytes: Uint8Array;
  fileName: string;
  baseName: string;
  extension: string;
  /** Directory of the source file; undefined when the caller passed bytes. */
  directory?: string;
}
