export type VoiceErrorKind = 'negotiation' | 'transport' | 'protocol' | 'remote' | 'hardware';

export class VoiceClientError extends Error {
  readonly kind: VoiceErrorKind;

  constructor(kind: VoiceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Session negotiation failed before any socket was opened. */
export class NegotiationError extends VoiceClientError {
  status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('negotiation', message, options);
    this.status = options?.status;
  }
}

export class TransportError extends VoiceClientError {
  code?: number;

  constructor(message: string, options?: { code?: number; cause?: unknown }) {
    super('transport', message, options);
    this.code = options?.code;
  }
}

/** Malformed or unexpected inbound frame. Recoverable unless repeated. */
export class ProtocolError extends VoiceClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
  }
}

export class RemoteError extends VoiceClientError {
  code: string;
  retryable: boolean;

  constructor(message: string, options: { code?: string; retryable: boolean }) {
    super('remote', message);
    this.code = options.code ?? 'unknown';
    this.retryable = options.retryable;
  }
}

export class HardwareError extends VoiceClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('hardware', message, options);
  }
}

export function toError(err: unknown, fallbackMessage = 'unknown error'): Error {
  if (err instanceof Error) return err;
  if (typeof err === 'string') return new Error(err);
  try {
    return new Error(JSON.stringify(err));
  } catch {
    return new Error(fallbackMessage);
  }
}

export function describeError(err: unknown): string {
  return toError(err).message;
}
