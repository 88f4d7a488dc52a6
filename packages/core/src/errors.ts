export type DigestErrorCode =
  | "EMPTY_TRANSCRIPT"
  | "MALFORMED_RESPONSE"
  | "CAPTION_FILE_UNREADABLE"
  | "INVALID_CONFIG";

export class DigestError extends Error {
  code: DigestErrorCode;
  details?: unknown;

  constructor(opts: { code: DigestErrorCode; message: string; details?: unknown; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "DigestError";
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** No segments could be obtained from captions or speech-to-text. */
export class EmptyTranscriptError extends DigestError {
  constructor(message = "No transcript segments available") {
    super({ code: "EMPTY_TRANSCRIPT", message });
    this.name = "EmptyTranscriptError";
  }
}

/** Model output that is still not a JSON object after repair. The raw text is kept for diagnostics. */
export class MalformedResponseError extends DigestError {
  raw: string;

  constructor(raw: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : "response is not a JSON object";
    super({ code: "MALFORMED_RESPONSE", message: `Malformed model response: ${reason}`, cause });
    this.name = "MalformedResponseError";
    this.raw = raw;
  }
}

export class CaptionFileError extends DigestError {
  filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({ code: "CAPTION_FILE_UNREADABLE", message: `Cannot read caption file ${filePath}: ${reason}`, cause });
    this.name = "CaptionFileError";
    this.filePath = filePath;
  }
}

export function isDigestError(err: unknown, code?: DigestErrorCode): err is DigestError {
  if (!(err instanceof DigestError)) return false;
  return code === undefined || err.code === code;
}
