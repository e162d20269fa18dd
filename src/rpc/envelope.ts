import { SerializationError } from '../errors';

export interface RequestHeader {
  serviceMethod: string
  seq: number
}

export interface ResponseHeader {
  serviceMethod: string
  seq: number
  // empty on success
  error: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSequence(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export function parseRequestHeader(value: unknown): RequestHeader {
  if (!isRecord(value) || typeof value.serviceMethod !== 'string' || !isSequence(value.seq)) {
    throw new SerializationError('malformed request header');
  }

  return { serviceMethod: value.serviceMethod, seq: value.seq };
}

export function parseResponseHeader(value: unknown): ResponseHeader {
  if (!isRecord(value) || typeof value.serviceMethod !== 'string' || !isSequence(value.seq)) {
    throw new SerializationError('malformed response header');
  }
  if (value.error !== undefined && value.error !== null && typeof value.error !== 'string') {
    throw new SerializationError('malformed response header');
  }

  return { serviceMethod: value.serviceMethod, seq: value.seq, error: value.error ?? '' };
}
