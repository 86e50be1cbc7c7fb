export type RemoteErrorKind =
  | 'not_configured'
  | 'network'
  | 'http'
  | 'timeout'
  | 'invalid_response'
  | 'empty_reply'
  | 'no_session';

export interface RemoteError {
  kind: RemoteErrorKind;
  message: string;
  status?: number;
}

export type RemoteResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteError };

export function ok<T>(value: T): RemoteResult<T> {
  return { ok: true, value };
}

export function fail(
  kind: RemoteErrorKind,
  message: string,
  status?: number,
): RemoteResult<never> {
  return {
    ok: false,
    error: status === undefined ? { kind, message } : { kind, message, status },
  };
}

export const FALLBACK_NO_SESSION =
  'Sorry, the AI service is currently unavailable.';
export const FALLBACK_EMPTY_REPLY = "Sorry, I couldn't process that right now.";
export const FALLBACK_UNAVAILABLE =
  'Sorry, the AI is temporarily unavailable. Please try again.';

/** User-facing text for a failed remote exchange. */
export function fallbackText(kind: RemoteErrorKind): string {
  switch (kind) {
    case 'no_session':
      return FALLBACK_NO_SESSION;
    case 'empty_reply':
      return FALLBACK_EMPTY_REPLY;
    default:
      return FALLBACK_UNAVAILABLE;
  }
}
