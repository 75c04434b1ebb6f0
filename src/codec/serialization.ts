/**
 * Envelope serialization for bridge communication.
 *
 * Envelopes are JSON documents, validated on the way in, and framed with a
 * 32-bit big-endian length prefix for stream transports.
 *
 * @module codec/serialization
 */

import * as crypto from 'node:crypto';
import { z } from 'zod';

import {
  BRIDGE_DEFAULTS,
  MessageSerializationError,
  type ConnectionId,
  type EncodedReference,
  type EncodedValue,
  type HandleToken,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
} from '../types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Length prefix size in bytes (32-bit unsigned integer, big-endian).
 */
const LENGTH_PREFIX_SIZE = 4;

const MAX_MESSAGE_SIZE = BRIDGE_DEFAULTS.MAX_MESSAGE_SIZE;

// =============================================================================
// Schemas
// =============================================================================

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

const connectionIdSchema = z.custom<ConnectionId>(isNonEmptyString, 'connection id must be a non-empty string');
const handleTokenSchema = z.custom<HandleToken>(isNonEmptyString, 'handle token must be a non-empty string');
const requestIdSchema = z.custom<RequestId>(isNonEmptyString, 'request id must be a non-empty string');

const encodedReferenceSchema: z.ZodType<EncodedReference> = z.object({
  t: z.literal('ref'),
  handle: handleTokenSchema,
  className: z.string(),
  classification: z.string(),
});

const encodedValueSchema: z.ZodType<EncodedValue> = z.lazy(() =>
  z.union([
    z.object({ t: z.literal('null') }),
    z.object({ t: z.literal('bool'), v: z.boolean() }),
    z.object({ t: z.literal('int'), v: z.number().int() }),
    z.object({ t: z.literal('long'), v: z.string() }),
    z.object({ t: z.literal('double'), v: z.union([z.number(), z.enum(['NaN', 'Infinity', '-Infinity', '-0'])]) }),
    z.object({ t: z.literal('string'), v: z.string() }),
    z.object({ t: z.literal('seq'), v: z.array(encodedValueSchema) }),
    encodedReferenceSchema,
  ]),
);

const requestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('hello'), connectionId: connectionIdSchema }),
  z.object({
    kind: z.literal('invoke'),
    connectionId: connectionIdSchema,
    targetHandle: handleTokenSchema.optional(),
    className: z.string().optional(),
    methodName: z.string().min(1),
    args: z.array(encodedValueSchema),
  }),
  z.object({ kind: z.literal('release'), connectionId: connectionIdSchema, handles: z.array(handleTokenSchema) }),
  z.object({ kind: z.literal('goodbye'), connectionId: connectionIdSchema }),
]);

const resultSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('primitive'), value: encodedValueSchema }),
  z.object({ kind: z.literal('reference'), reference: encodedReferenceSchema }),
  z.object({ kind: z.literal('void') }),
  z.object({
    kind: z.literal('error'),
    error: z.object({ className: z.string(), message: z.string(), stack: z.string().optional() }),
  }),
]);

const versionSchema = z.literal(BRIDGE_DEFAULTS.PROTOCOL_VERSION);

const requestEnvelopeSchema: z.ZodType<RequestEnvelope> = z.object({
  version: versionSchema,
  requestId: requestIdSchema,
  request: requestSchema,
});

const responseEnvelopeSchema: z.ZodType<ResponseEnvelope> = z.object({
  version: versionSchema,
  requestId: requestIdSchema,
  result: resultSchema,
});

// =============================================================================
// Helpers
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function parseJson(buffer: Buffer): unknown {
  return JSON.parse(buffer.toString('utf8'));
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Serializer for bridge envelopes.
 *
 * @example
 * ```typescript
 * const framed = Serializer.frame(Serializer.serialize(envelope));
 *
 * const { payload, bytesConsumed } = Serializer.unframe(received);
 * if (payload) {
 *   const response = Serializer.deserializeResponse(payload);
 * }
 * ```
 */
export const Serializer = {
  /**
   * Serializes a request or response envelope into a Buffer.
   *
   * @throws {MessageSerializationError} If the envelope cannot be stringified
   */
  serialize(envelope: RequestEnvelope | ResponseEnvelope): Buffer {
    try {
      return Buffer.from(JSON.stringify(envelope), 'utf8');
    } catch (error) {
      throw new MessageSerializationError('serialize', toError(error));
    }
  },

  /**
   * Parses and validates a request envelope.
   *
   * @throws {MessageSerializationError} If the payload is not a valid request
   */
  deserializeRequest(buffer: Buffer): RequestEnvelope {
    return parseWith(buffer, requestEnvelopeSchema);
  },

  /**
   * Parses and validates a response envelope.
   *
   * @throws {MessageSerializationError} If the payload is not a valid response
   */
  deserializeResponse(buffer: Buffer): ResponseEnvelope {
    return parseWith(buffer, responseEnvelopeSchema);
  },

  /**
   * Reads the request id of a payload without validating the rest, so a
   * runtime can still answer a malformed request.
   */
  peekRequestId(buffer: Buffer): RequestId | undefined {
    try {
      const parsed = z.object({ requestId: requestIdSchema }).safeParse(parseJson(buffer));
      return parsed.success ? parsed.data.requestId : undefined;
    } catch {
      return undefined;
    }
  },

  /**
   * Adds length-prefix framing to a serialized envelope.
   *
   * @throws {MessageSerializationError} If the payload exceeds the maximum size
   */
  frame(payload: Buffer): Buffer {
    if (payload.length > MAX_MESSAGE_SIZE) {
      throw new MessageSerializationError(
        'serialize',
        new Error(`Message size ${payload.length} exceeds maximum ${MAX_MESSAGE_SIZE}`),
      );
    }

    const frame = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + payload.length);
    frame.writeUInt32BE(payload.length, 0);
    payload.copy(frame, LENGTH_PREFIX_SIZE);

    return frame;
  },

  /**
   * Extracts one payload from framed data starting at `offset`.
   *
   * Returns a null payload when the data is incomplete.
   *
   * @throws {MessageSerializationError} If the announced size exceeds the maximum
   */
  unframe(buffer: Buffer, offset: number = 0): { payload: Buffer | null; bytesConsumed: number } {
    const available = buffer.length - offset;

    if (available < LENGTH_PREFIX_SIZE) {
      return { payload: null, bytesConsumed: 0 };
    }

    const messageLength = buffer.readUInt32BE(offset);

    if (messageLength > MAX_MESSAGE_SIZE) {
      throw new MessageSerializationError(
        'deserialize',
        new Error(`Message size ${messageLength} exceeds maximum ${MAX_MESSAGE_SIZE}`),
      );
    }

    const totalLength = LENGTH_PREFIX_SIZE + messageLength;

    if (available < totalLength) {
      return { payload: null, bytesConsumed: 0 };
    }

    const payload = buffer.subarray(offset + LENGTH_PREFIX_SIZE, offset + totalLength);

    return { payload, bytesConsumed: totalLength };
  },

  MAX_MESSAGE_SIZE,

  LENGTH_PREFIX_SIZE,
} as const;

function parseWith<T>(buffer: Buffer, schema: z.ZodType<T>): T {
  let json: unknown;
  try {
    json = parseJson(buffer);
  } catch (error) {
    throw new MessageSerializationError('deserialize', toError(error));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new MessageSerializationError('deserialize', new Error(describeIssues(parsed.error)));
  }
  return parsed.data;
}

// =============================================================================
// Id Generation
// =============================================================================

/**
 * Generates a unique ConnectionId.
 *
 * Format: `c` + timestamp(base36) + `-` + 16 hex chars.
 */
export function generateConnectionId(): ConnectionId {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(8).toString('hex');
  return `c${timestamp}-${random}` as ConnectionId;
}

/**
 * Generates a unique RequestId.
 *
 * Format: timestamp(base36) + `-` + 16 hex chars.
 */
export function generateRequestId(): RequestId {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(8).toString('hex');
  return `${timestamp}-${random}` as RequestId;
}

/**
 * Validates that a string has the RequestId format.
 */
export function isValidRequestId(value: string): value is RequestId {
  return /^[0-9a-z]+-[0-9a-f]{16}$/.test(value);
}
