/**
 * PWMR Portal Scraper
 *
 * Logs into the plastic waste EPR portal as one account and collects:
 *
 *   procurement   material procurement, all years since April 2020
 *   sales         one fetch per financial year since 2020, concatenated
 *   wallet        credit wallet
 *   target        dashboard target table
 *   annual        annual report filing (first table on the page)
 *   compliance    second table on the annual report page
 *   next_target   third table on the annual report page
 *
 * Every row carries Type_of_entity, Entity_Name and Email.
 */
import type { Page } from "puppeteer-core";
import config from "../config";
import { PORTAL, SECTION_NAMES } from "../config/constants";
import { logger } from "../monitoring/logger";
import type { ScrapedSections, SectionTable } from "../shared/types/section.types";
import { currentFinancialYear, financialYearRange } from "../shared/utils/date";
import { PageContext } from "./browser/page-context";
import type { PageContextOptions } from "./browser/page-context";
import { extractEntityInfo } from "./extractors/entity.extractor";
import { extractSection } from "./extractors/table.extractor";
import type { EntityIdentity } from "./extractors/table.extractor";
import { fetchDateRange, login, openSection } from "./navigators/portal-navigator";

export interface ScrapeRequest {
  email: string;
  password: string;
}

export interface ScrapeOutcome {
  entityName: string;
  entityType: string;
  sections: ScrapedSections;
}

/** Anything that can turn credentials into scraped sections */
export interface Scraper {
  scrape(request: ScrapeRequest): Promise<ScrapeOutcome>;
}

export interface PwmrScraperOptions extends PageContextOptions {
  verificationTimeoutMs?: number;
}

export class PwmrScraper implements Scraper {
  private readonly options: PwmrScraperOptions;

  constructor(options: PwmrScraperOptions = {}) {
    this.options = options;
  }

  async scrape(request: ScrapeRequest): Promise<ScrapeOutcome> {
    const context = new PageContext(this.options);
    const startTime = Date.now();

    try {
      const page = await context.open();
      await login(
        page,
        request.email,
        request.password,
        this.options.verificationTimeoutMs ?? config.manualVerificationTimeoutMs
      );

      await openSection(page, PORTAL.DASHBOARD_PATH);
      const entity = await extractEntityInfo(page);
      const identity: EntityIdentity = { ...entity, email: request.email };

      const sections: ScrapedSections = {
        [SECTION_NAMES.PROCUREMENT]: await this.scrapeProcurement(page, identity),
        [SECTION_NAMES.SALES]: await this.scrapeSales(page, identity),
        [SECTION_NAMES.WALLET]: await this.scrapeSimple(page, PORTAL.WALLET_PATH, identity),
        [SECTION_NAMES.TARGET]: await this.scrapeSimple(page, PORTAL.DASHBOARD_PATH, identity),
      };

      await openSection(page, PORTAL.ANNUAL_PATH);
      sections[SECTION_NAMES.ANNUAL] = await extractSection(page, identity, 0);
      sections[SECTION_NAMES.COMPLIANCE] = await extractSection(page, identity, 1);
      sections[SECTION_NAMES.NEXT_TARGET] = await extractSection(page, identity, 2);

      logger.info(
        {
          email: request.email,
          durationMs: Date.now() - startTime,
          rows: Object.fromEntries(Object.entries(sections).map(([name, rows]) => [name, rows.length])),
        },
        "Portal scrape finished"
      );

      return { entityName: entity.entityName, entityType: entity.entityType, sections };
    } finally {
      await context.close();
    }
  }

  private async scrapeProcurement(page: Page, identity: EntityIdentity): Promise<SectionTable> {
    await openSection(page, PORTAL.PROCUREMENT_PATH);
    const from = financialYearRange(PORTAL.FIRST_FINANCIAL_YEAR).from;
    const to = financialYearRange(currentFinancialYear()).to;
    await fetchDateRange(page, from, to);
    return extractSection(page, identity);
  }

  private async scrapeSales(page: Page, identity: EntityIdentity): Promise<SectionTable> {
    await openSection(page, PORTAL.SALES_PATH);
    const rows: SectionTable = [];

    for (let year = PORTAL.FIRST_FINANCIAL_YEAR; year <= currentFinancialYear(); year++) {
      const range = financialYearRange(year);
      await fetchDateRange(page, range.from, range.to);
      const yearRows = await extractSection(page, identity);
      logger.debug({ year, rows: yearRows.length }, "Sales year fetched");
      rows.push(...yearRows);
    }
    return rows;
  }

  private async scrapeSimple(page: Page, path: string, identity: EntityIdentity): Promise<SectionTable> {
    await openSection(page, path);
    return extractSection(page, identity);
  }
}
