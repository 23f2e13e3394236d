/**
 * Job-specific failures.
 * None of these are retried: the job is marked failed and the worker moves on.
 */
import { ServiceError } from "./service.error";
import { ERROR_CODES } from "../../config/constants";

/** The job's identity has no entry in any credential file */
export class CredentialNotFoundError extends ServiceError {
  public readonly email: string;

  constructor(email: string) {
    super(`No credentials found for ${email}`, ERROR_CODES.CREDENTIAL_NOT_FOUND, false);
    this.name = "CredentialNotFoundError";
    this.email = email;
  }
}

/** The portal session failed in a way the scraper could not recover from */
export class ScrapeFailureError extends ServiceError {
  constructor(message: string = "Scrape failed", code: string = ERROR_CODES.SCRAPE_FAILED) {
    super(message, code, false);
    this.name = "ScrapeFailureError";
  }
}

/** Nobody completed the captcha/OTP step within the allowed window */
export class ManualVerificationTimeoutError extends ScrapeFailureError {
  constructor(timeoutMs: number) {
    super(
      `Manual verification not completed within ${Math.round(timeoutMs / 1000)}s`,
      ERROR_CODES.MANUAL_VERIFICATION_TIMEOUT
    );
    this.name = "ManualVerificationTimeoutError";
  }
}
