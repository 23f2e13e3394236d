/**
 * Portal Navigator
 *
 * Login and page-level interactions on the EPR portal:
 * - login: fill credentials, then wait for a person to finish the
 *   captcha/OTP step in the browser window
 * - openSection: hash-route navigation plus a short settle delay for the
 *   portal's client-side rendering
 * - fetchDateRange: fill the from/to date inputs and press Fetch
 */
import { TimeoutError } from "puppeteer-core";
import type { Page } from "puppeteer-core";
import config from "../../config";
import { PORTAL } from "../../config/constants";
import { logger } from "../../monitoring/logger";
import { ManualVerificationTimeoutError, ScrapeFailureError } from "../../shared/errors/scrape.errors";
import { errorMessage } from "../../shared/errors/service.error";
import { sleep } from "../../shared/utils/retry";

export function portalUrl(path: string): string {
  return `${config.portalBaseUrl.replace(/\/$/, "")}${path}`;
}

/**
 * @throws ManualVerificationTimeoutError if nobody completes verification in time
 */
export async function login(
  page: Page,
  email: string,
  password: string,
  verificationTimeoutMs: number = config.manualVerificationTimeoutMs
): Promise<void> {
  await page.goto(portalUrl(PORTAL.LOGIN_PATH), { waitUntil: "networkidle2" });

  await page.waitForSelector(PORTAL.SELECTORS.USER_INPUT);
  await page.type(PORTAL.SELECTORS.USER_INPUT, email);
  await page.type(PORTAL.SELECTORS.PASSWORD_INPUT, password);

  logger.info({ email, timeoutMs: verificationTimeoutMs }, "Credentials entered, awaiting captcha/OTP");

  try {
    await page.waitForSelector(PORTAL.SELECTORS.LOGGED_IN_MARKER, { timeout: verificationTimeoutMs });
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new ManualVerificationTimeoutError(verificationTimeoutMs);
    }
    throw new ScrapeFailureError(`Login failed: ${errorMessage(error)}`);
  }

  logger.info({ email }, "Logged in");
}

export async function openSection(page: Page, path: string): Promise<void> {
  await page.goto(portalUrl(path), { waitUntil: "networkidle2" });
  await sleep(PORTAL.SETTLE_DELAY_MS);
}

async function setDateInput(page: Page, selector: string, value: string): Promise<void> {
  await page.$eval(
    selector,
    (element, text) => {
      if (!(element instanceof HTMLInputElement)) return;
      element.value = text;
      element.dispatchEvent(new Event("input", { bubbles: true }));
      element.dispatchEvent(new Event("change", { bubbles: true }));
    },
    value
  );
}

/** Fill the date range (DD/MM/YYYY) and wait for the table to refresh */
export async function fetchDateRange(page: Page, from: string, to: string): Promise<void> {
  await setDateInput(page, PORTAL.SELECTORS.DATE_FROM, from);
  await setDateInput(page, PORTAL.SELECTORS.DATE_TO, to);
  await page.click(PORTAL.SELECTORS.FETCH_BUTTON);
  await sleep(PORTAL.SETTLE_DELAY_MS);
}
