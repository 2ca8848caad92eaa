import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import gcnJsonNoticeSchema from '../schemas/gcn-json-notice.schema.json';
import noticeEnvelopeSchema from '../schemas/notice-envelope.schema.json';
import queryRequestSchema from '../schemas/query-request.schema.json';
import resolutionConfigSchema from '../schemas/resolution-config.schema.json';
import caseResolutionSchema from '../schemas/case-resolution.schema.json';
import corroborationSchema from '../schemas/corroboration.schema.json';
import { logger } from './logger';
import type { GcnJsonNotice, RawNotice } from '../types/notice';
import type { QueryRequest } from '../types/query';
import type { ResolutionConfig } from '../config/resolution';
import type { ManualCaseAction } from '../pipeline/transient-graph';

export interface CorroborationRequest {
  label?: string;
}

// Type for validation errors
export interface ValidationError {
  path: string;
  message: string;
}

export class SchemaValidationError extends Error {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

// Validation never rewrites its input: notices are normalized as pure
// transforms and configs are merged with defaults before they get here.
const ajv = new Ajv({
  allErrors: true,
  allowUnionTypes: true,
});

// Add formats like 'date-time'
addFormats(ajv);

// Compile validators once at startup
const validateGcnJson: ValidateFunction<GcnJsonNotice> = ajv.compile<GcnJsonNotice>(gcnJsonNoticeSchema);
const validateEnvelope: ValidateFunction<RawNotice> = ajv.compile<RawNotice>(noticeEnvelopeSchema);
const validateQuery: ValidateFunction<QueryRequest> = ajv.compile<QueryRequest>(queryRequestSchema);
const validateResolution: ValidateFunction<ResolutionConfig> =
  ajv.compile<ResolutionConfig>(resolutionConfigSchema);
const validateCaseAction: ValidateFunction<ManualCaseAction> = ajv.compile<ManualCaseAction>(caseResolutionSchema);
const validateCorroborationBody: ValidateFunction<CorroborationRequest> =
  ajv.compile<CorroborationRequest>(corroborationSchema);

/**
 * Run a compiled validator and turn its failure into a SchemaValidationError
 */
function check<T>(validate: ValidateFunction<T>, schema: string, data: unknown, message: string): T {
  if (validate(data)) {
    return data;
  }

  const errors = formatValidationErrors(validate.errors || []);
  logger.warn({ schema, errors }, 'Schema validation failed');
  throw new SchemaValidationError(message, errors);
}

/**
 * Validate the payload of a `gcn-json` notice
 * @throws SchemaValidationError listing every violation
 */
export function validateGcnJsonNotice(data: unknown): GcnJsonNotice {
  return check(validateGcnJson, 'gcn-json-notice', data, 'Invalid gcn-json notice');
}

/**
 * Validate a notice envelope received from the broker
 */
export function validateNoticeEnvelope(data: unknown): RawNotice {
  return check(validateEnvelope, 'notice-envelope', data, 'Invalid notice envelope');
}

/**
 * Validate a query request received on the query boundary
 */
export function validateQueryRequest(data: unknown): QueryRequest {
  return check(validateQuery, 'query-request', data, 'Invalid query request');
}

/**
 * Validate a complete resolution config document
 */
export function validateResolutionConfig(data: unknown): ResolutionConfig {
  return check(validateResolution, 'resolution-config', data, 'Invalid resolution config');
}

export function validateCaseResolution(data: unknown): ManualCaseAction {
  return check(validateCaseAction, 'case-resolution', data, 'Invalid case resolution');
}

export function validateCorroboration(data: unknown): CorroborationRequest {
  return check(validateCorroborationBody, 'corroboration', data, 'Invalid corroboration request');
}

/**
 * Format AJV errors into a more readable structure
 */
export function formatValidationErrors(errors: ErrorObject[]): ValidationError[] {
  return errors.map(error => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
  }));
}
