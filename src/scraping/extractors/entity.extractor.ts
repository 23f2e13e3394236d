/**
 * Entity Extractor
 *
 * Reads the account's user type and company name from the dashboard,
 * where each value sits in the first span after its label paragraph.
 */
import type { Page } from "puppeteer-core";
import { PORTAL, UNKNOWN_VALUE } from "../../config/constants";
import { logger } from "../../monitoring/logger";

export interface EntityInfo {
  entityType: string;
  entityName: string;
}

function labelledValueSelector(label: string): string {
  return `::-p-xpath(//p[normalize-space(text())="${label}"]/following::span[1])`;
}

async function readLabelledValue(page: Page, label: string, timeoutMs: number): Promise<string> {
  const handle = await page.waitForSelector(labelledValueSelector(label), { timeout: timeoutMs });
  if (!handle) return UNKNOWN_VALUE;

  try {
    const text = await handle.evaluate((element) => (element.textContent ?? "").trim());
    return text.length > 0 ? text : UNKNOWN_VALUE;
  } finally {
    await handle.dispose();
  }
}

export async function extractEntityInfo(page: Page, timeoutMs: number = 20000): Promise<EntityInfo> {
  const entityType = await readLabelledValue(page, PORTAL.LABELS.ENTITY_TYPE, timeoutMs);
  const entityName = await readLabelledValue(page, PORTAL.LABELS.COMPANY_NAME, timeoutMs);

  logger.info({ entityName, entityType }, "Entity identified");
  return { entityType, entityName };
}
