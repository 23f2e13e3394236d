/**
 * Credential Loader
 *
 * Portal credentials and account metadata live in JSON files keyed by email:
 *
 *   { "ops@example.com": { "password": "...", "entity_name": "...", "entity_type": "..." } }
 *
 * Files are merged in order; an email present in several files takes its
 * entry from the last one. Missing files are skipped silently, unreadable or
 * invalid ones with a warning.
 */
import { promises as fs } from "fs";
import path from "path";
import config from "../config";
import { logger } from "../monitoring/logger";
import { validateCredentialFile } from "../processing/data-validator";
import { CredentialNotFoundError } from "../shared/errors/scrape.errors";
import { errorMessage } from "../shared/errors/service.error";
import type { CredentialEntry, CredentialMap, JobParams } from "../shared/types/job.types";

/** Resolves the current credential map; re-read on every call */
export type CredentialLookup = () => Promise<CredentialMap>;

async function readCredentialFile(file: string): Promise<CredentialMap | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    logger.warn({ file, error: errorMessage(error) }, "Credential file unreadable, skipping");
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn({ file, error: errorMessage(error) }, "Credential file is not valid JSON, skipping");
    return null;
  }

  const result = validateCredentialFile(parsed);
  if (!result.ok) {
    logger.warn({ file, details: result.error.details }, "Credential file has an invalid shape, skipping");
    return null;
  }
  return result.value;
}

export async function loadCredentials(
  files: string[] = config.credentialFiles,
  baseDir: string = process.cwd()
): Promise<CredentialMap> {
  const merged: CredentialMap = {};

  for (const file of files) {
    const content = await readCredentialFile(path.resolve(baseDir, file));
    if (content) Object.assign(merged, content);
  }

  return merged;
}

export const defaultCredentialLookup: CredentialLookup = () => loadCredentials();

/**
 * Fill in parameters the job does not carry from the stored credentials.
 * Keys already present on the job win; null and empty-string values count
 * as absent.
 *
 * @throws CredentialNotFoundError when the email has no stored entry
 */
export async function backfillCredentials<T extends JobParams & { email: string }>(
  job: T,
  lookup: CredentialLookup
): Promise<T> {
  const credentials = await lookup();
  const entry: CredentialEntry | undefined = credentials[job.email];
  if (!entry) throw new CredentialNotFoundError(job.email);

  const filled: JobParams = {};
  for (const [key, value] of Object.entries(entry)) {
    const current = job[key];
    if (current === undefined || current === null || current === "") filled[key] = value;
  }
  return { ...job, ...filled };
}
