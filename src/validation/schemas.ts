// Validation utilities for wire and request schemas.
// Schemas live beside this module and are resolved via resolveJsonModule.
import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import type { RawEvent } from "../types";
import type { EncodedValue } from "../wire/codec";
import channelEnvelopeSchema from "./schemas/channelEnvelope.schema.json";
import rawEventSchema from "./schemas/rawEvent.schema.json";
import cancelRequestSchema from "./schemas/cancelRequest.schema.json";

export interface ChannelEnvelope {
  eventId: string;
  payload: EncodedValue;
}

export interface CancelRequest {
  action?: "cancel" | "interrupt";
  wait?: boolean;
  timeoutMs?: number;
}

const ajv = new Ajv({ strict: false, allErrors: true, allowUnionTypes: true });

const validateEnvelopeFn: ValidateFunction<ChannelEnvelope> = ajv.compile<ChannelEnvelope>(channelEnvelopeSchema);
const validateRawEventFn: ValidateFunction<RawEvent> = ajv.compile<RawEvent>(rawEventSchema);
const validateCancelRequestFn: ValidateFunction<CancelRequest> = ajv.compile<CancelRequest>(cancelRequestSchema);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) return [];
  return errors.map((e) => {
    const path = e.instancePath && e.instancePath.length ? e.instancePath : "(root)";
    const message = e.message ?? JSON.stringify(e);
    return `${path} ${message}`.trim();
  });
}

function check<T>(fn: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (fn(data)) return { valid: true, value: data };
  return { valid: false, errors: formatErrors(fn.errors) };
}

/**
 * validateEnvelope
 * Validate a decoded pub/sub message against the channel envelope schema.
 */
export function validateEnvelope(data: unknown): ValidationResult<ChannelEnvelope> {
  return check(validateEnvelopeFn, data);
}

/**
 * validateRawEvent
 * Validate a decoded payload against the RawEvent schema.
 */
export function validateRawEvent(data: unknown): ValidationResult<RawEvent> {
  return check(validateRawEventFn, data);
}

export function validateCancelRequest(data: unknown): ValidationResult<CancelRequest> {
  return check(validateCancelRequestFn, data);
}
