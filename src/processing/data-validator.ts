/**
 * Data Validator
 *
 * Joi schemas for data entering the service from outside:
 * - scrape request bodies posted to the API
 * - credential files read from disk
 *
 * Validation returns either the cleaned value or a RequestValidationError;
 * callers decide how to report it.
 */
import Joi from "joi";
import { ERROR_CODES } from "../config/constants";
import { ServiceError } from "../shared/errors/service.error";
import type { CredentialMap, JobRequest } from "../shared/types/job.types";

export class RequestValidationError extends ServiceError {
  public readonly details: string[];

  constructor(details: string[]) {
    super(`Validation failed: ${details.join("; ")}`, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "RequestValidationError";
    this.details = details;
  }
}

const paramValue = Joi.alternatives()
  .try(Joi.string().allow(""), Joi.number(), Joi.boolean())
  .allow(null);

/** Body of POST /pwmr/scrape. Extra scalar fields are passed through to the job. */
const scrapeRequestSchema = Joi.object<JobRequest>({
  email: Joi.string().trim().email({ tlds: { allow: false } }).required(),
  password: Joi.string().allow(""),
  entity_name: Joi.string().allow(""),
  entity_type: Joi.string().allow(""),
  year: Joi.number().integer().min(2000).max(2100),
}).pattern(Joi.string(), paramValue);

/** { "<email>": { "password": "...", ... }, ... } */
const credentialFileSchema = Joi.object<CredentialMap>().pattern(
  Joi.string(),
  Joi.object().pattern(Joi.string(), paramValue)
);

export type Validated<T> = { ok: true; value: T } | { ok: false; error: RequestValidationError };

function toValidated<T>(result: Joi.ValidationResult<T>): Validated<T> {
  if (result.error) {
    return {
      ok: false,
      error: new RequestValidationError(result.error.details.map((detail) => detail.message)),
    };
  }
  return { ok: true, value: result.value };
}

export function validateScrapeRequest(body: unknown): Validated<JobRequest> {
  return toValidated(scrapeRequestSchema.validate(body, { abortEarly: false, convert: true }));
}

export function validateCredentialFile(content: unknown): Validated<CredentialMap> {
  return toValidated(credentialFileSchema.validate(content, { abortEarly: false }));
}
