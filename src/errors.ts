import axios from 'axios';

export const ErrorKind = {
  Validation: 'ValidationError',
  NoVdcSelected: 'NoVdcSelected',
  RemoteRejected: 'RemoteRejected',
  AuthFailure: 'AuthFailure',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface CliErrorDetails {
  statusCode?: number;
  minorErrorCode?: string;
}

export class CliError extends Error {
  readonly kind: ErrorKind;
  readonly details: CliErrorDetails;

  constructor(kind: ErrorKind, message: string, details: CliErrorDetails = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }
}

export const validationError = (message: string) => new CliError(ErrorKind.Validation, message);

export const noVdcSelected = () =>
  new CliError(
    ErrorKind.NoVdcSelected,
    'No virtual datacenter selected. Set VCD_VDC_HREF to the href of the vdc to work with.'
  );

export const remoteRejected = (message: string, details: CliErrorDetails = {}) =>
  new CliError(ErrorKind.RemoteRejected, message, details);

export const authFailure = (message: string, details: CliErrorDetails = {}) =>
  new CliError(ErrorKind.AuthFailure, message, details);

export type Result<T, E = CliError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E = CliError>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Converts anything thrown by the HTTP layer or by our own code into a
 * {@link CliError}. CliErrors pass through unchanged.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return authFailure(`Session invalid or expired (HTTP ${status})`, { statusCode: status });
    }
    if (status !== undefined) {
      return remoteRejected(`Request failed with HTTP ${status}`, { statusCode: status });
    }
    return remoteRejected(`Request failed: ${error.code ?? error.message}`);
  }
  return remoteRejected(error instanceof Error ? error.message : String(error));
}

/**
 * Runs a remote-call body and captures its outcome as a {@link Result}.
 */
export async function attempt<T>(body: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await body());
  } catch (error) {
    return err(toCliError(error));
  }
}
