/**
 * Error taxonomy for the export run.
 *
 * None of these are retried: the tool is meant to be re-run after the input or
 * the options are fixed.
 */

export type ThreadExportErrorCode =
  | 'UNSUPPORTED_MEDIA'
  | 'INVALID_RECORD'
  | 'ARCHIVE_FORMAT'
  | 'INVALID_DATE_FILTER'
  | 'INVALID_TIMEZONE'
  | 'MEDIA_COPY'
  | 'CSV_FORMAT';

export class ThreadExportError extends Error {
  readonly code: ThreadExportErrorCode;

  constructor(code: ThreadExportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Attachment kind outside photo, video and animated_gif.
 */
export class UnsupportedMediaError extends ThreadExportError {
  readonly recordId: string;
  readonly mediaKind: string;

  constructor(recordId: string, mediaKind: string) {
    super('UNSUPPORTED_MEDIA', `Unsupported media type "${mediaKind}" in post ${recordId}`);
    this.recordId = recordId;
    this.mediaKind = mediaKind;
  }
}

export class InvalidRecordError extends ThreadExportError {
  readonly recordId: string;

  constructor(recordId: string, reason: string) {
    super('INVALID_RECORD', `Invalid post ${recordId}: ${reason}`);
    this.recordId = recordId;
  }
}

export class ArchiveFormatError extends ThreadExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ARCHIVE_FORMAT', message, options);
  }
}

export class InvalidDateFilterError extends ThreadExportError {
  readonly value: string;

  constructor(value: string) {
    super('INVALID_DATE_FILTER', `Invalid date filter "${value}"`);
    this.value = value;
  }
}

export class InvalidTimezoneError extends ThreadExportError {
  readonly timeZone: string;

  constructor(timeZone: string) {
    super('INVALID_TIMEZONE', `Unknown time zone "${timeZone}"`);
    this.timeZone = timeZone;
  }
}

export class MediaCopyError extends ThreadExportError {
  readonly source: string;
  readonly target: string;

  constructor(source: string, target: string, cause: unknown) {
    super('MEDIA_COPY', `Failed to copy media ${source} to ${target}`, { cause });
    this.source = source;
    this.target = target;
  }
}

/**
 * Category fix file without the expected columns.
 */
export class CsvFormatError extends ThreadExportError {
  constructor(message: string) {
    super('CSV_FORMAT', message);
  }
}

export function isThreadExportError(error: unknown): error is ThreadExportError {
  return error instanceof ThreadExportError;
}
